export class CompositionBuffer {
  private chars: string[] = [];

  get length(): number {
    return this.chars.length;
  }

  push(ch: string): void {
    this.chars.push(ch);
  }

  pop(): string | undefined {
    return this.chars.pop();
  }

  clear(): void {
    this.chars = [];
  }

  replaceAt(index: number, ch: string): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.chars.length) {
      throw new RangeError(`replaceAt: index ${index} outside buffer of length ${this.chars.length}`);
    }
    this.chars[index] = ch;
  }

  toArray(): string[] {
    return [...this.chars];
  }

  toString(): string {
    return this.chars.join("");
  }
}
