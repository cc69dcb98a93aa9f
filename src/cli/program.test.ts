import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '@/lib/config';
import { createServices } from '@/lib/services';
import { makeTempDir } from '@/test/helpers';
import { createProgram } from './program';

describe('docqa CLI', () => {
  let dir: string;

  const docqa = (...args: string[]) => {
    const config = loadConfig({
      VECTOR_DB_PATH: path.join(dir, 'index'),
      EMBEDDER: 'hashing',
      EMBEDDING_DIMENSION: '64',
      USE_DUMMY_LLM: 'true',
    });
    return createProgram(() => createServices(config)).parseAsync(args, { from: 'user' });
  };

  const lastPrinted = (): unknown => {
    const calls = vi.mocked(console.log).mock.calls;
    return JSON.parse(String(calls[calls.length - 1]?.[0]));
  };

  const writeFile = (name: string, content: string) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    dir = makeTempDir('docqa-cli-');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reports stats for a fresh index', async () => {
    await docqa('stats');

    expect(lastPrinted()).toEqual({
      totalVectors: 0,
      dimension: 64,
      totalDocuments: 0,
      indexFileExists: true,
      metadataFileExists: true,
    });
  });

  it('ingests files under consecutive document ids and skips empty ones', async () => {
    const alpha = writeFile('alpha.txt', 'Alpha particles are helium nuclei.');
    const empty = writeFile('empty.txt', '   ');
    const beta = writeFile('beta.txt', 'Beta decay emits electrons.');

    await docqa('ingest', alpha, empty, beta);

    expect(lastPrinted()).toEqual({
      success: true,
      files: [
        { fileName: 'alpha.txt', documentId: 1, chunks: 1 },
        { fileName: 'beta.txt', documentId: 2, chunks: 1 },
      ],
      totalChunks: 2,
    });
    expect(console.warn).toHaveBeenCalledWith('Skipping empty.txt: no text to index');

    await docqa('documents');
    expect(lastPrinted()).toMatchObject({
      documents: [
        { documentId: 2, filename: 'beta.txt', totalChunks: 1 },
        { documentId: 1, filename: 'alpha.txt', totalChunks: 1 },
      ],
      stats: { totalDocuments: 2, totalChunks: 2, totalVectors: 2 },
    });
  });

  it('answers questions in dummy mode', async () => {
    await docqa('ingest', writeFile('alpha.txt', 'Alpha particles are helium nuclei.'));

    await docqa('query', '-k', '1', 'what are alpha particles');

    expect(lastPrinted()).toEqual({
      answer: expect.stringMatching(/^\[DUMMY MODE\] You asked: 'Context:/),
      sources: [{ filename: 'alpha.txt', pageNumber: 1, similarityScore: expect.any(Number) }],
      contextUsed: true,
      chunksRetrieved: 1,
      degraded: false,
    });
  });

  it('deletes a document by id', async () => {
    await docqa('ingest', '--document-id', '10', writeFile('alpha.txt', 'Alpha particles are helium nuclei.'));

    await docqa('delete', '10');
    expect(lastPrinted()).toEqual({ documentId: 10, removed: 1 });

    await docqa('stats');
    expect(lastPrinted()).toMatchObject({ totalVectors: 0, totalDocuments: 0 });
  });

  it('sets a failing exit code when a command fails', async () => {
    await docqa('ingest', path.join(dir, 'missing.txt'));

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Ingestion error:', expect.any(Error));
  });
});
