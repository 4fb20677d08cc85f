import { describe, it, expect } from '@jest/globals';
import JSZip from 'jszip';
import { ParseError } from '@simval/domain';

import { JsZipArchiveReader } from '../index.js';

describe('JsZipArchiveReader', () => {
  const reader = new JsZipArchiveReader();

  it('lists file entries and reads their bytes', async () => {
    const zip = new JSZip();
    zip.file('TC_r0/VUT_status.csv', 'Time\n0\n');
    zip.folder('TC_r1');
    const bytes = await zip.generateAsync({ type: 'nodebuffer' });

    const entries = await reader.open(bytes);
    expect(entries.map((entry) => entry.path)).toEqual(['TC_r0/VUT_status.csv']);

    const [entry] = entries;
    const content = entry ? await entry.read() : Buffer.alloc(0);
    expect(content.toString('utf-8')).toBe('Time\n0\n');
  });

  it('rejects bytes that are not a ZIP archive', async () => {
    const error = await reader.open(Buffer.from('plain text')).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ParseError);
    expect(error instanceof Error ? error.message : '').toMatch(/^Cannot open ZIP: /);
  });
});
