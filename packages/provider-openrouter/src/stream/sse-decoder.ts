/**
 * Incremental server-sent events decoder.
 *
 * Bytes go in as they arrive from the body reader; complete `data` payloads
 * come out. Multi-byte UTF-8 sequences may be split across chunks. Lines end
 * in `\n` or `\r\n`. Comment lines (`:` keep-alives) and fields other than
 * `data` are dropped. Bytes that are not valid UTF-8 make `push` or `flush`
 * throw a `TypeError`.
 */
export class SseDecoder {
  private decoder = new TextDecoder("utf-8", { fatal: true });
  private buffer = "";
  private data: string[] = [];

  /** Feed one body chunk; returns the payloads of every event it completed. */
  push(bytes: Uint8Array): string[] {
    this.buffer += this.decoder.decode(bytes, { stream: true });
    const out: string[] = [];
    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      this.processLine(line.endsWith("\r") ? line.slice(0, -1) : line, out);
      newline = this.buffer.indexOf("\n");
    }
    return out;
  }

  /** End of body: returns an event left without its terminating blank line. */
  flush(): string[] {
    this.buffer += this.decoder.decode();
    const out: string[] = [];
    if (this.buffer.length > 0) {
      const line = this.buffer;
      this.buffer = "";
      this.processLine(line.endsWith("\r") ? line.slice(0, -1) : line, out);
    }
    this.dispatch(out);
    return out;
  }

  private processLine(line: string, out: string[]): void {
    if (line === "") {
      this.dispatch(out);
      return;
    }
    if (line.startsWith(":")) return;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    if (field !== "data") return;

    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);
    this.data.push(value);
  }

  private dispatch(out: string[]): void {
    if (this.data.length === 0) return;
    out.push(this.data.join("\n"));
    this.data = [];
  }
}
