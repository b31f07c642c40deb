/**
 * CLI export and import commands.
 *
 *   trellis export                      current graph as YAML on stdout
 *   trellis export backup.json -f json  write a JSON copy to a file
 *   trellis import backup.json          replace the graph with a file's
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { Graph } from '../../core/graph/graph.js';
import { getLogger } from '../../core/logger.js';
import { pushWarning } from '../../core/output.js';
import { decodeDocument, encodeDocument, type DocumentFormat } from '../../store/document.js';
import { readStoreFile, writeStoreFile } from '../../store/files.js';
import { loadGraph, saveGraph } from '../../store/graph-store.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { commandContext, withGraph } from '../runtime.js';

export function parseDocumentFormat(value: string): DocumentFormat {
  if (value === 'yaml' || value === 'json') return value;
  throw new TrellisError(ExitCode.INVALID_INPUT, `Unknown format '${value}'`, { fix: 'Use yaml or json.' });
}

export function registerExportCommand(program: Command): void {
  program
    .command('export [file]')
    .description('Write the graph document to a file, or to stdout')
    .option('-f, --format <format>', 'yaml or json', 'yaml')
    .action(async (file: string | undefined, opts: { format: string }, command: Command) => {
      try {
        const format = parseDocumentFormat(opts.format);
        const text = await withGraph(command, { mutates: false }, ({ graph }) => encodeDocument(graph.snapshot(), format));
        if (file === undefined) {
          process.stdout.write(text);
          return;
        }
        const path = resolve(file);
        await writeStoreFile(path, text, 'document');
        cliOutput({ path, format }, { command: 'export', operation: 'graph.export', message: `Exported graph to ${path}` });
      } catch (err) {
        exitWithError(err, 'graph.export');
      }
    });
}

/**
 * Register import. Any supported document version is accepted; the graph
 * is written back in the current version.
 */
export function registerImportCommand(program: Command): void {
  program
    .command('import <file>')
    .description('Replace the graph with the contents of a document file')
    .action(async (file: string, _opts: unknown, command: Command) => {
      try {
        const source = resolve(file);
        const text = await readStoreFile(source, 'document');
        if (text === null) {
          throw new TrellisError(ExitCode.NOT_FOUND, `File not found: ${source}`);
        }
        const decoded = decodeDocument(text);
        if (decoded.upgraded) {
          pushWarning({
            code: 'W_DOCUMENT_UPGRADED',
            message: `Imported a version ${decoded.version} document with the compatibility decoder.`,
          });
        }

        const ctx = await commandContext(command);
        const previous = await loadGraph(ctx.graphPath);
        const graph = new Graph(decoded.snapshot);
        await saveGraph(ctx.graphPath, graph);
        getLogger('cli').info({ source, graphPath: ctx.graphPath }, 'Imported graph');

        const data = { source, graphPath: ctx.graphPath, nodes: graph.nodeCount, replaced: previous.graph.nodeCount };
        cliOutput(data, {
          command: 'import',
          operation: 'graph.import',
          message: `Imported ${data.nodes} nodes (replaced ${data.replaced})`,
        });
      } catch (err) {
        exitWithError(err, 'graph.import');
      }
    });
}
