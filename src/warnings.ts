/**
 * Collects parser warnings in the order they were raised, dropping repeats
 */
export class WarningCollector {
  private readonly messages: string[] = [];
  private readonly seen = new Set<string>();
  private readonly reportedKinds = new Set<string>();

  add(message: string, line?: number): void {
    const text = line ? `Line ${line}: ${message}` : message;
    if (this.seen.has(text)) return;
    this.seen.add(text);
    this.messages.push(text);
  }

  /**
   * Report a message at most once per `kind`, however often it occurs
   */
  addOnce(kind: string, message: string, line?: number): void {
    if (this.reportedKinds.has(kind)) return;
    this.reportedKinds.add(kind);
    this.add(message, line);
  }

  toArray(): string[] {
    return [...this.messages];
  }
}
