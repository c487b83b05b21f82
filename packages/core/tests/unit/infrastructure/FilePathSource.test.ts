import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'nem12sql-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  it('should stream file content as chunks', async () => {
    const filePath = writeTempFile('read-basic.csv', '100,NEM12\n900\n');
    const source = new FilePathSource(filePath);

    const chunks: string[] = [];
    for await (const chunk of source.read()) {
      chunks.push(chunk);
    }

    expect(chunks.join('')).toBe('100,NEM12\n900\n');
  });

  it('should respect a small highWaterMark', async () => {
    const filePath = writeTempFile('read-small-chunks.csv', '100,NEM12\n900\n');
    const source = new FilePathSource(filePath, { highWaterMark: 4 });

    const chunks: string[] = [];
    for await (const chunk of source.read()) {
      chunks.push(chunk);
    }

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.join('')).toBe('100,NEM12\n900\n');
  });

  it('should report the file name', () => {
    const filePath = writeTempFile('meta.csv', '900\n');
    const source = new FilePathSource(filePath);

    expect(source.metadata()).toEqual({ fileName: 'meta.csv', mimeType: 'text/csv' });
  });

  it('should reject when the file does not exist', async () => {
    const source = new FilePathSource(join(TEST_DIR, 'missing.csv'));

    await expect(async () => {
      for await (const _chunk of source.read()) {
        // drain
      }
    }).rejects.toThrow('ENOENT');
  });
});
