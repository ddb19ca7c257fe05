type OnceState<T> =
  | { status: 'empty' }
  | { status: 'pending'; promise: Promise<T> }
  | { status: 'ready'; value: T };

/**
 * Lazily computes an async value at most once. Concurrent callers share the
 * in-flight promise; a rejected computation leaves the slot empty.
 */
export class Once<T> {
  private state: OnceState<T> = { status: 'empty' };

  constructor(private readonly compute: () => Promise<T>) {}

  get(): Promise<T> {
    switch (this.state.status) {
      case 'ready':
        return Promise.resolve(this.state.value);
      case 'pending':
        return this.state.promise;
      case 'empty':
        return this.start();
    }
  }

  private start(): Promise<T> {
    const promise = Promise.resolve()
      .then(() => this.compute())
      .then(
        (value) => {
          this.state = { status: 'ready', value };
          return value;
        },
        (error: unknown) => {
          this.state = { status: 'empty' };
          throw error;
        }
      );
    this.state = { status: 'pending', promise };
    return promise;
  }
}

/** Synchronous counterpart of {@link Once}. */
export class Lazy<T> {
  private state: { ready: false } | { ready: true; value: T } = {
    ready: false,
  };

  constructor(private readonly compute: () => T) {}

  get(): T {
    if (!this.state.ready) {
      this.state = { ready: true, value: this.compute() };
    }
    return this.state.value;
  }
}
