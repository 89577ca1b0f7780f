const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const ASCII_ONLY = /^[\x00-\x7f]*$/;

type ClusterBounds = { start: number; end: number };

function clusterContaining(text: string, index: number): ClusterBounds | null {
  if (index < 0 || index >= text.length) {
    return null;
  }
  if (ASCII_ONLY.test(text)) {
    return { start: index, end: index + 1 };
  }
  const cluster = graphemes.segment(text).containing(index);
  if (!cluster) {
    return null;
  }
  return { start: cluster.index, end: cluster.index + cluster.segment.length };
}

/**
 * Length in code units of the user-perceived character ending at `offset`.
 * Surrogate pairs, combining sequences and emoji ZWJ sequences count as one.
 */
export function graphemeClusterLengthBefore(
  text: string,
  offset: number,
): number {
  const end = Math.min(offset, text.length);
  const cluster = clusterContaining(text, end - 1);
  return cluster ? end - cluster.start : 0;
}

/** Length in code units of the user-perceived character starting at `offset`. */
export function graphemeClusterLengthAfter(
  text: string,
  offset: number,
): number {
  const cluster = clusterContaining(text, Math.max(offset, 0));
  return cluster ? cluster.end - offset : 0;
}
