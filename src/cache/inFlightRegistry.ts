export type LaunchResult<T> = {
  launched: boolean;
  promise: Promise<T>;
};

/** Tracks long-running tasks by key so a second launch joins the running one. */
export class InFlightRegistry<T> {
  private readonly tasks = new Map<string, Promise<T>>();

  launch(key: string, task: () => Promise<T>): LaunchResult<T> {
    const running = this.tasks.get(key);
    if (running) return { launched: false, promise: running };

    const promise = task().finally(() => {
      this.tasks.delete(key);
    });
    this.tasks.set(key, promise);
    return { launched: true, promise };
  }

  has(key: string): boolean {
    return this.tasks.has(key);
  }

  size(): number {
    return this.tasks.size;
  }

  /** Resolves once the task under `key` has finished, whatever its outcome. */
  async settled(key: string): Promise<void> {
    const running = this.tasks.get(key);
    if (!running) return;
    await running.then(
      () => undefined,
      () => undefined
    );
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.tasks.values()]);
  }
}
