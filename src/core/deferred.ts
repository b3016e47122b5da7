/** One-shot promise handle: settle once from outside, await from anywhere. */
export class Deferred<T> {
  readonly promise: Promise<T>
  private _settled = false
  private _resolve!: (value: T) => void
  private _reject!: (reason: unknown) => void

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this._resolve = resolve
      this._reject = reject
    })
  }

  get settled(): boolean {
    return this._settled
  }

  /** Returns false when already settled. */
  resolve(value: T): boolean {
    if (this._settled) return false
    this._settled = true
    this._resolve(value)
    return true
  }

  reject(reason: unknown): boolean {
    if (this._settled) return false
    this._settled = true
    this._reject(reason)
    return true
  }
}
