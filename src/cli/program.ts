import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs';
import path from 'path';
import { ingestText } from '@/lib/rag';
import type { RagServices } from '@/lib/services';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Build the CLI. Services are created per command so that `--help`
 * never touches the index directory.
 */
export function createProgram(getServices: () => RagServices): Command {
  const program = new Command();

  async function run(label: string, action: (services: RagServices) => Promise<void>) {
    let services: RagServices | undefined;
    try {
      services = getServices();
      await action(services);
    } catch (error) {
      console.error(`${label} error:`, error);
      process.exitCode = 1;
    } finally {
      services?.close();
    }
  }

  program
    .name('docqa')
    .description('Ask questions about your documents using a local vector index');

  program
    .command('ingest')
    .description('Chunk, embed and index text files')
    .argument('<files...>', 'UTF-8 text files to ingest')
    .option('-d, --document-id <id>', 'Document id of the first file', parseInteger)
    .option('-p, --pages <n>', 'Known page count, used for page estimates', parseInteger)
    .option('--chunk-size <n>', 'Words per chunk', parseInteger)
    .option('--overlap <n>', 'Words of overlap between chunks', parseInteger)
    .action(async (files: string[], options: {
      documentId?: number;
      pages?: number;
      chunkSize?: number;
      overlap?: number;
    }) => {
      await run('Ingestion', async ({ config, index }) => {
        let documentId = options.documentId ?? index.nextDocumentId();
        const results: Array<{ fileName: string; documentId: number; chunks: number }> = [];

        for (const file of files) {
          // Read file content
          const text = fs.readFileSync(file, 'utf8');
          const fileName = path.basename(file);

          const result = await ingestText(index, {
            documentId,
            filename: fileName,
            text,
            chunkSize: options.chunkSize ?? config.chunkSize,
            overlap: options.overlap ?? config.chunkOverlap,
            totalPages: options.pages,
          });

          if (result.chunks === 0) {
            console.warn(`Skipping ${fileName}: no text to index`);
            continue; // Skip empty files
          }

          results.push({ fileName, documentId, chunks: result.chunks });
          documentId++;
        }

        print({
          success: true,
          files: results,
          totalChunks: results.reduce((sum, r) => sum + r.chunks, 0),
        });
      });
    });

  program
    .command('query')
    .description('Answer a question from the indexed documents')
    .argument('<question...>', 'Question to ask')
    .option('-k, --top-k <n>', 'Number of chunks to retrieve (1-20)', parseInteger)
    .action(async (words: string[], options: { topK?: number }) => {
      await run('Query', async ({ config, engine }) => {
        const result = await engine.query(words.join(' '), options.topK ?? config.defaultTopK);
        print(result);
      });
    });

  program
    .command('delete')
    .description('Remove a document from the index')
    .argument('<documentId>', 'Document id', parseInteger)
    .action(async (documentId: number) => {
      await run('Delete', async ({ index }) => {
        const removed = await index.deleteDocument(documentId);
        print({ documentId, removed });
      });
    });

  program
    .command('documents')
    .description('List indexed documents')
    .action(async () => {
      await run('Documents list', async ({ index }) => {
        const documents = index.listDocuments();
        print({
          documents,
          stats: {
            totalDocuments: documents.length,
            totalChunks: documents.reduce((sum, doc) => sum + doc.totalChunks, 0),
            totalVectors: index.stats().totalVectors,
          },
        });
      });
    });

  program
    .command('stats')
    .description('Show vector index statistics')
    .action(async () => {
      await run('Stats', async ({ index }) => {
        print(index.stats());
      });
    });

  return program;
}
