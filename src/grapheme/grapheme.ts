/**
 * One user-perceived character: an extended grapheme cluster's text.
 * Equality is by value.
 */
export class Grapheme {
  readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  equals(other: Grapheme | string): boolean {
    return this.value === (typeof other === "string" ? other : other.value);
  }

  toString(): string {
    return this.value;
  }
}
