import fs from 'node:fs';
import { formatClock } from './naming.js';

/**
 * Human-readable evidence file: timestamped headings followed by the
 * verbatim output of the commands that prove each step.
 */
export class Transcript {
  private readonly filePath: string;
  private readonly clock: () => Date;

  constructor(filePath: string, clock: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.clock = clock;
  }

  line(text: string): void {
    fs.appendFileSync(this.filePath, `[${formatClock(this.clock())}] ${text}\n`, 'utf-8');
  }

  section(title: string, body: string): void {
    this.line(`== ${title}`);
    const text = body === '' || body.endsWith('\n') ? body : `${body}\n`;
    fs.appendFileSync(this.filePath, text || '(no output)\n', 'utf-8');
  }
}
