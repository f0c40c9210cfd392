/**
 * Caller-owned mutable string used as decode scratch space.
 * Whatever reads it last owns its contents.
 */
export class ScratchBuffer {
  private text = '';

  get value(): string {
    return this.text;
  }

  assign(text: string): void {
    this.text = text;
  }

  clear(): void {
    this.text = '';
  }

  toString(): string {
    return this.text;
  }
}
