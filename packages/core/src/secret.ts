import {Buffer} from 'node:buffer'
import {inspect} from 'node:util'

const redacted = '********'

/**
 * Holds sensitive text (the encryption passphrase) outside of any
 * string that ends up in logs, events or error details.
 *
 * The value lives in a Buffer so it can be zero-filled once consumed.
 * Every serialization path renders the redacted placeholder.
 */
export class Secret {
  private readonly buffer: Buffer
  private cleared = false

  constructor(value: string) {
    this.buffer = Buffer.from(value, 'utf8')
  }

  static empty(): Secret {
    return new Secret('')
  }

  get isEmpty(): boolean {
    return this.cleared || this.buffer.length === 0
  }

  get isCleared(): boolean {
    return this.cleared
  }

  /**
   * Returns the plain value. Keep the result in the narrowest scope possible.
   */
  reveal(): string {
    if (this.cleared) {
      return ''
    }

    return this.buffer.toString('utf8')
  }

  clear(): void {
    this.buffer.fill(0)
    this.cleared = true
  }

  toString(): string {
    return redacted
  }

  toJSON(): string {
    return redacted
  }

  [inspect.custom](): string {
    return `Secret(${redacted})`
  }
}
