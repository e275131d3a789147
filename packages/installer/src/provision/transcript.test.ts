import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Transcript } from './transcript.js';

describe('Transcript', () => {
  let dir: string;
  let file: string;
  const clock = () => new Date(2026, 9, 19, 10, 15, 0);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'zbx-tr-'));
    file = path.join(dir, 'run.transcript.txt');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes timestamped lines', () => {
    const transcript = new Transcript(file, clock);
    transcript.line('Host: pve01');
    expect(fs.readFileSync(file, 'utf-8')).toBe('[2026-10-19 10:15:00] Host: pve01\n');
  });

  it('terminates section bodies with a newline', () => {
    const transcript = new Transcript(file, clock);
    transcript.section('zabbix_agent2 -V', 'zabbix_agent2 (Zabbix) 7.4.2');
    transcript.section('Listeners on 10050/tcp', '');
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      [
        '[2026-10-19 10:15:00] == zabbix_agent2 -V',
        'zabbix_agent2 (Zabbix) 7.4.2',
        '[2026-10-19 10:15:00] == Listeners on 10050/tcp',
        '(no output)',
        '',
      ].join('\n'),
    );
  });
});
