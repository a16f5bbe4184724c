/** A promise with its settle functions exposed. */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private settled = false;
  private resolveFn: (value: T) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((res) => {
      this.resolveFn = res;
    });
  }

  resolve(value: T): void {
    if (this.settled) return;
    this.settled = true;
    this.resolveFn(value);
  }
}
