/**
 * Serialises every state change for one task. Steps run one at a time in
 * post order; a step that throws is handed to `onError` and the chain
 * carries on.
 */
export class TaskActor {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly onError: (err: unknown) => Promise<void> | void) {}

  post(step: () => Promise<void> | void): Promise<void> {
    const run = this.tail.then(step).catch((err: unknown) => this.onError(err));
    this.tail = run;
    return run;
  }

  /** Resolves once every step posted so far has run. */
  idle(): Promise<void> {
    return this.tail;
  }
}
