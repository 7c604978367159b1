/**
 * Ordered, de-duplicating list of configure flags
 */
export class FlagList {
  private readonly order: string[] = [];
  private readonly members = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    this.appendAll(initial);
  }

  /**
   * Append a flag. Returns false when the flag was already present; the
   * existing occurrence keeps its position.
   */
  append(flag: string): boolean {
    if (this.members.has(flag)) {
      return false;
    }
    this.members.add(flag);
    this.order.push(flag);
    return true;
  }

  appendAll(flags: Iterable<string>): this {
    for (const flag of flags) {
      this.append(flag);
    }
    return this;
  }

  has(flag: string): boolean {
    return this.members.has(flag);
  }

  get size(): number {
    return this.order.length;
  }

  toArray(): string[] {
    return [...this.order];
  }
}
