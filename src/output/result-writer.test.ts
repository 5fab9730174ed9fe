import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ResultWriter, resultFields } from './result-writer.js';

describe('resultFields', () => {
  it('keeps an empty host name as its own field', () => {
    expect(resultFields({ host: '10.0.0.5', port: 22, status: 'open', hostname: '' })).toEqual([
      '10.0.0.5',
      '22',
      'open',
      '',
    ]);
  });

  it('omits the host name field when names are not resolved', () => {
    expect(resultFields({ host: '10.0.0.5', port: 'n/a', status: 'host-excluded' })).toEqual([
      '10.0.0.5',
      'n/a',
      'host-excluded',
    ]);
  });
});

describe('ResultWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tcpsweep-writer-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes tab-separated lines', () => {
    const lines: string[] = [];
    const writer = new ResultWriter({ writeLine: (line) => lines.push(line) });

    writer.emit({ host: '10.0.0.5', port: 80, status: 'open' });
    writer.emit({ host: '10.0.0.5', port: 443, status: 'open', hostname: 'web.lan' });
    writer.close();

    expect(lines).toEqual(['10.0.0.5\t80\topen', '10.0.0.5\t443\topen\tweb.lan']);
  });

  it('mirrors every line as a CSV row', () => {
    const file = path.join(dir, 'results.csv');
    const writer = new ResultWriter({ outputFile: file, writeLine: () => {} });

    writer.emit({ host: '10.0.0.5', port: 80, status: 'open' });
    writer.emit({ host: '10.0.0.6', port: 'n/a', status: 'host-excluded' });
    writer.close();

    expect(fs.readFileSync(file, 'utf8')).toBe('10.0.0.5,80,open\n10.0.0.6,n/a,host-excluded\n');
  });

  it('truncates an existing output file', () => {
    const file = path.join(dir, 'results.csv');
    fs.writeFileSync(file, 'stale,row\n');

    const writer = new ResultWriter({ outputFile: file, writeLine: () => {} });
    writer.emit({ host: '10.0.0.5', port: 22, status: 'closed' });
    writer.close();
    writer.close();

    expect(fs.readFileSync(file, 'utf8')).toBe('10.0.0.5,22,closed\n');
  });
});
