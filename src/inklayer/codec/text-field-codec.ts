import {
  isRecord,
  parseArray,
  readNumber,
  readOptionalNumber,
  MalformedRecordError,
} from "./guards";

/**
 * Persisted text field. `zIndex` and `lastModified` were added later and
 * default to 0 and load time.
 */
export type TextFieldRecord = {
  text: string;
  positionX: number;
  positionY: number;
  zIndex: number;
  lastModified: number;
};

export type DecodeOptions = {
  now?: () => number;
};

export function encodeTextFields(records: readonly TextFieldRecord[]): string {
  return JSON.stringify(
    records.map((record) => ({
      text: record.text,
      positionX: record.positionX,
      positionY: record.positionY,
      zIndex: record.zIndex,
      lastModified: record.lastModified,
    })),
  );
}

function decodeRecord(
  value: unknown,
  index: number,
  loadedAt: number,
): TextFieldRecord {
  const context = `text field ${index}`;
  if (!isRecord(value)) {
    throw new MalformedRecordError(`${context}: not an object`);
  }
  if (typeof value.text !== "string") {
    throw new MalformedRecordError(`${context}: text must be a string`);
  }
  const zIndex = readOptionalNumber(value, "zIndex", 0, context);
  if (!Number.isInteger(zIndex)) {
    throw new MalformedRecordError(`${context}: zIndex must be an integer`);
  }
  return {
    text: value.text,
    positionX: readNumber(value, "positionX", context),
    positionY: readNumber(value, "positionY", context),
    zIndex,
    lastModified: readOptionalNumber(value, "lastModified", loadedAt, context),
  };
}

/**
 * Decodes persisted text fields. Blank input, invalid JSON, or any record of
 * the wrong shape yields an empty collection.
 */
export function decodeTextFields(
  json: string,
  options: DecodeOptions = {},
): TextFieldRecord[] {
  try {
    const items = parseArray(json);
    if (!items) {
      return [];
    }
    const loadedAt = (options.now ?? Date.now)();
    return items.map((item, index) => decodeRecord(item, index, loadedAt));
  } catch (error) {
    console.warn("[inklayer] Ignoring malformed text fields:", error);
    return [];
  }
}
