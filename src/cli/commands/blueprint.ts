/**
 * CLI blueprint commands (`trellis bp ...`).
 *
 * A blueprint is a saved subtree that can be inserted again anywhere:
 *
 *   trellis bp save 4 weekly-review     save node 4's subtree, then remove it
 *   trellis bp ins weekly-review today  insert it under today's date node
 *   trellis bp edit weekly-review -- add 'Water plants' 0
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join, resolve } from 'node:path';
import { Command } from 'commander';
import type { BlueprintDoc } from '../../types/graph.js';
import { BLUEPRINT_EXTENSION } from '../../core/constants.js';
import { TrellisError } from '../../core/errors.js';
import { extractBlueprint, importBlueprint } from '../../core/graph/blueprint.js';
import { Graph } from '../../core/graph/graph.js';
import { getLogger } from '../../core/logger.js';
import {
  decodeBlueprint,
  encodeBlueprint,
  listBlueprints,
  loadBlueprint,
  removeBlueprint,
  saveBlueprint,
} from '../../store/blueprint-store.js';
import { readStoreFile, writeStoreFile } from '../../store/files.js';
import { loadGraph, saveGraph } from '../../store/graph-store.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderBlueprintList, renderTree } from '../renderers/graph.js';
import { commandContext, connectionMessage, withGraph } from '../runtime.js';
import { toTreeLines, type TreeLine } from '../views.js';
import { parseDocumentFormat } from './transfer.js';

interface SaveOptions {
  author?: string;
  toFile?: boolean;
  preserve?: boolean;
  overwrite?: boolean;
}

const PATH_LIKE = /[\\/]|\.(ya?ml|json)$/;

/** Runs one graph command line against the graph file at `graphPath`. */
export type GraphCommandRunner = (graphPath: string, args: string[]) => Promise<void>;

/** A blueprint read from a file path rather than the store. */
interface BlueprintFile {
  doc: BlueprintDoc;
  path: string;
}

/**
 * Read a blueprint by store name, or from a file when the argument looks
 * like a path (`path` is then set).
 */
async function locateBlueprint(blueprintDir: string, cwd: string, name: string): Promise<BlueprintDoc | BlueprintFile> {
  if (PATH_LIKE.test(name)) {
    const path = resolve(cwd, name);
    const text = await readStoreFile(path, 'blueprint');
    if (text === null) {
      throw new TrellisError(ExitCode.NOT_FOUND, `File not found: ${path}`);
    }
    return { doc: decodeBlueprint(text), path };
  }
  return loadBlueprint(blueprintDir, name);
}

async function readBlueprint(blueprintDir: string, cwd: string, name: string): Promise<BlueprintDoc> {
  const found = await locateBlueprint(blueprintDir, cwd, name);
  return 'path' in found ? found.doc : found;
}

function registerSave(bp: Command): void {
  bp.command('save <id> <name>')
    .description('Save a subtree as a blueprint and remove it from the graph')
    .option('-a, --author <author>', 'Author recorded in the blueprint')
    .option('-f, --to-file', `Write ./<name>${BLUEPRINT_EXTENSION} instead of the blueprint store`)
    .option('-p, --preserve', 'Keep the subtree in the graph')
    .option('-o, --overwrite', 'Replace an existing blueprint of the same name')
    .action(async (id: string, name: string, opts: SaveOptions, command: Command) => {
      try {
        const result = await withGraph(command, { mutates: !opts.preserve }, async (ctx) => {
          const { graph } = ctx;
          const handle = graph.resolve(id);
          const doc = extractBlueprint(graph, handle, { author: opts.author });
          const dir = opts.toFile ? ctx.cwd : ctx.blueprintDir;
          const path = await saveBlueprint(dir, name, doc, { overwrite: opts.overwrite });
          if (!opts.preserve) {
            graph.removeRecursive(handle);
          }
          return { name, path, nodes: doc.nodes.length, removed: !opts.preserve };
        });
        cliOutput(result, {
          command: 'bp save',
          operation: 'blueprint.save',
          message: `Saved ${result.nodes} nodes as '${name}' (${result.path})`,
        });
      } catch (err) {
        exitWithError(err, 'blueprint.save');
      }
    });
}

function registerInsert(bp: Command): void {
  bp.command('ins <name> [id] [title]')
    .description('Insert a blueprint under a node, or as a root')
    .option('-r, --root', 'Insert as a new root')
    .action(async (name: string, id: string | undefined, title: string | undefined, opts: { root?: boolean }, command: Command) => {
      try {
        if (opts.root && id !== undefined && title !== undefined) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'With --root, pass at most a title');
        }
        if (!opts.root && id === undefined) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'A target node is required', {
            fix: 'Pass a target id, or --root to insert as a new root.',
          });
        }
        // With --root the second positional is the title
        const target = opts.root ? null : id ?? null;
        const newTitle = opts.root ? id : title;

        const result = await withGraph(command, { mutates: true }, async (ctx) => {
          const doc = await readBlueprint(ctx.blueprintDir, ctx.cwd, name);
          const { graph } = ctx;
          const parent = target === null ? null : graph.resolve(target);
          const root = importBlueprint(graph, doc, parent);
          if (newTitle !== undefined) {
            graph.rename(root, newTitle);
          }
          const where = parent === null ? 'as a root' : `under ${parent}`;
          return {
            data: { name, root, nodes: doc.nodes.length },
            message: connectionMessage(ctx, `Inserted '${name}' at ${root} ${where}`),
          };
        });
        cliOutput(result.data, { command: 'bp ins', operation: 'blueprint.insert', message: result.message });
      } catch (err) {
        exitWithError(err, 'blueprint.insert');
      }
    });
}

function registerList(bp: Command): void {
  bp.command('ls')
    .description('List saved blueprints')
    .action(async (_opts: unknown, command: Command) => {
      try {
        const ctx = await commandContext(command);
        const blueprints = await listBlueprints(ctx.blueprintDir);
        cliOutput({ blueprints }, { command: 'bp ls', operation: 'blueprint.list', render: renderBlueprintList });
      } catch (err) {
        exitWithError(err, 'blueprint.list');
      }
    });
}

interface BlueprintPreview {
  name: string;
  title: string;
  author: string | null;
  lines: TreeLine[];
}

function renderPreview(data: BlueprintPreview, quiet: boolean): string {
  if (quiet) return renderTree(data, quiet);
  const by = data.author ? ` by ${data.author}` : '';
  return `${data.name}: ${data.title}${by}\n${renderTree(data, quiet)}`;
}

function registerShow(bp: Command): void {
  bp.command('show <name>')
    .description('Show the tree a blueprint would insert')
    .action(async (name: string, _opts: unknown, command: Command) => {
      try {
        const ctx = await commandContext(command);
        const doc = await readBlueprint(ctx.blueprintDir, ctx.cwd, name);
        const preview = new Graph();
        importBlueprint(preview, doc, null);
        const data: BlueprintPreview = {
          name,
          title: doc.title,
          author: doc.author,
          lines: toTreeLines(preview.traverse(preview.roots)),
        };
        cliOutput(data, { command: 'bp show', operation: 'blueprint.show', render: renderPreview });
      } catch (err) {
        exitWithError(err, 'blueprint.show');
      }
    });
}

function registerRemove(bp: Command): void {
  bp.command('rm <names...>')
    .description('Delete saved blueprints')
    .action(async (names: string[], _opts: unknown, command: Command) => {
      try {
        const ctx = await commandContext(command);
        for (const name of names) {
          await removeBlueprint(ctx.blueprintDir, name);
        }
        cliOutput({ removed: names }, {
          command: 'bp rm',
          operation: 'blueprint.remove',
          message: `Removed ${names.join(', ')}`,
        });
      } catch (err) {
        exitWithError(err, 'blueprint.remove');
      }
    });
}

function registerExport(bp: Command): void {
  bp.command('export <name>')
    .description('Print a blueprint document')
    .option('-f, --format <format>', 'yaml or json', 'yaml')
    .action(async (name: string, opts: { format: string }, command: Command) => {
      try {
        const format = parseDocumentFormat(opts.format);
        const ctx = await commandContext(command);
        const doc = await readBlueprint(ctx.blueprintDir, ctx.cwd, name);
        process.stdout.write(encodeBlueprint(doc, format));
      } catch (err) {
        exitWithError(err, 'blueprint.export');
      }
    });
}

/**
 * Run a graph command against the graph a blueprint describes, then write
 * the blueprint back. The blueprint root is handle 0 while the command runs.
 */
function registerEdit(bp: Command, runGraphCommand: GraphCommandRunner): void {
  bp.command('edit <name> <args...>')
    .description('Edit a blueprint in place with a graph command (put -- before the command)')
    .allowUnknownOption()
    .action(async (name: string, args: string[], _opts: unknown, command: Command) => {
      try {
        const ctx = await commandContext(command);
        const found = await locateBlueprint(ctx.blueprintDir, ctx.cwd, name);
        const doc = 'path' in found ? found.doc : found;

        const workDir = await mkdtemp(join(tmpdir(), 'trellis-bp-edit-'));
        try {
          const graphPath = join(workDir, 'graph.yaml');
          const graph = new Graph();
          importBlueprint(graph, doc, null);
          await saveGraph(graphPath, graph);

          await runGraphCommand(graphPath, args);

          const { graph: edited } = await loadGraph(graphPath);
          const updated = extractBlueprint(edited, 0, { author: doc.author });
          if ('path' in found) {
            const format = extname(found.path) === '.json' ? 'json' : 'yaml';
            await writeStoreFile(found.path, encodeBlueprint(updated, format), 'blueprint');
          } else {
            await saveBlueprint(ctx.blueprintDir, name, updated, { overwrite: true });
          }
          getLogger('cli').info({ name, nodes: updated.nodes.length }, 'Edited blueprint');
        } finally {
          await rm(workDir, { recursive: true, force: true });
        }
      } catch (err) {
        exitWithError(err, 'blueprint.edit');
      }
    });
}

/**
 * Register the `bp` command group. `bp edit` is only available when a
 * runner for the inner graph command is given.
 */
export function registerBlueprintCommands(program: Command, runGraphCommand?: GraphCommandRunner): void {
  const bp = program
    .command('bp')
    .alias('blueprint')
    .description('Save and reuse subtrees as blueprints');

  registerSave(bp);
  registerInsert(bp);
  registerList(bp);
  registerShow(bp);
  registerRemove(bp);
  registerExport(bp);
  if (runGraphCommand) {
    registerEdit(bp, runGraphCommand);
  }
}
