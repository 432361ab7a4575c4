/**
 * Append-only text accumulator for one generation run. Nothing leaves it until the run
 * has finished.
 */
export class OutputBuffer {
  private readonly chunks: string[] = [];

  write(text: string): this {
    this.chunks.push(text);
    return this;
  }

  line(text = ""): this {
    return this.write(`${text}\n`);
  }

  blank(count = 1): this {
    return this.write("\n".repeat(count));
  }

  toString(): string {
    return this.chunks.join("");
  }
}
