export type Unsubscribe = () => void;

/**
 * Listener set plus a version that bumps on every change, so render loops
 * can skip work when nothing moved.
 */
export class ChangeEmitter {
  private readonly listeners = new Set<() => void>();
  private currentVersion = 0;

  get version(): number {
    return this.currentVersion;
  }

  subscribe(listener: () => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit() {
    this.currentVersion += 1;
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
