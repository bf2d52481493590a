/**
 * A dispatched server-sent event.
 */
export interface SseEvent {
  /** Event type ('message' when the stream did not name one) */
  event: string;
  data: string;
  id?: string;
}

/**
 * Incremental text/event-stream parser.
 *
 * Feed decoded chunks with push(); each call returns the events completed
 * by that chunk. Chunks may split lines anywhere.
 */
export class SseParser {
  private buffer = '';
  private eventType = '';
  private dataLines: string[] = [];
  private lastId: string | undefined;

  push(chunk: string): SseEvent[] {
    this.buffer += chunk;
    const events: SseEvent[] = [];

    let newline = this.findLineEnd();
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline.index);
      this.buffer = this.buffer.slice(newline.index + newline.length);
      const event = this.processLine(line);
      if (event) {
        events.push(event);
      }
      newline = this.findLineEnd();
    }

    return events;
  }

  /**
   * Flush at end of stream. A trailing event without its blank line is
   * still delivered.
   */
  end(): SseEvent[] {
    const events: SseEvent[] = [];
    if (this.buffer.length > 0) {
      const event = this.processLine(this.buffer);
      this.buffer = '';
      if (event) events.push(event);
    }
    const pending = this.dispatch();
    if (pending) events.push(pending);
    return events;
  }

  private findLineEnd(): { index: number; length: number } | -1 {
    const lf = this.buffer.indexOf('\n');
    const cr = this.buffer.indexOf('\r');
    if (lf === -1 && cr === -1) return -1;

    if (cr !== -1 && (lf === -1 || cr < lf)) {
      // A lone CR at the end of the buffer may be the first half of CRLF
      if (cr === this.buffer.length - 1) return -1;
      return { index: cr, length: this.buffer[cr + 1] === '\n' ? 2 : 1 };
    }
    return { index: lf, length: 1 };
  }

  private processLine(line: string): SseEvent | null {
    if (line === '') {
      return this.dispatch();
    }

    // Comment / keep-alive
    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        this.eventType = value;
        break;
      case 'data':
        this.dataLines.push(value);
        break;
      case 'id':
        this.lastId = value;
        break;
      default:
        // retry and unknown fields are ignored
        break;
    }
    return null;
  }

  private dispatch(): SseEvent | null {
    if (this.dataLines.length === 0) {
      this.eventType = '';
      return null;
    }

    const event: SseEvent = {
      event: this.eventType || 'message',
      data: this.dataLines.join('\n'),
    };
    if (this.lastId !== undefined) {
      event.id = this.lastId;
    }

    this.eventType = '';
    this.dataLines = [];
    return event;
  }
}
