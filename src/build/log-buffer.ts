/**
 * Keeps the last `maxLines` complete lines of a stream plus any unterminated remainder.
 * A remainder longer than `maxLineChars` keeps only its last characters.
 */
export class TailBuffer {
  private readonly lines: string[] = [];
  private partial = "";

  constructor(
    private readonly maxLines = 200,
    private readonly maxLineChars = 4096
  ) {}

  push(chunk: string): string[] {
    const pieces = (this.partial + chunk).split(/\r?\n/);
    const remainder = pieces.pop() ?? "";
    this.partial = remainder.length > this.maxLineChars ? remainder.slice(-this.maxLineChars) : remainder;
    this.lines.push(...pieces);
    if (this.lines.length > this.maxLines) {
      this.lines.splice(0, this.lines.length - this.maxLines);
    }
    return pieces;
  }

  text(): string {
    const tail = this.partial ? [...this.lines, this.partial] : this.lines;
    return tail.slice(-this.maxLines).join("\n");
  }
}
