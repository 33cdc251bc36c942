import { EventEmitter } from 'events';
import type { ProgramLike } from '../../src/tui/backend/blessed-backend.js';

/** Records the terminal calls a BlessedBackend makes. */
export class FakeProgram extends EventEmitter implements ProgramLike {
  readonly calls: string[] = [];
  readonly writes: string[] = [];

  constructor(public rows = 3, public cols = 5) {
    super();
  }

  alternateBuffer() { this.calls.push('alternateBuffer'); }
  normalBuffer() { this.calls.push('normalBuffer'); }
  hideCursor() { this.calls.push('hideCursor'); }
  showCursor() { this.calls.push('showCursor'); }
  enableMouse() { this.calls.push('enableMouse'); }
  disableMouse() { this.calls.push('disableMouse'); }
  clear() { this.calls.push('clear'); }
  move(x: number, y: number) { this.calls.push(`move ${x},${y}`); }
  write(text: string) { this.writes.push(text); }
  flush() { this.calls.push('flush'); }
  destroy() { this.calls.push('destroy'); }
}
