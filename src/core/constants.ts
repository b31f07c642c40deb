/**
 * Shared constants.
 */

/** Version of the persisted document shape. Bump whenever the graph schema changes. */
export const DOCUMENT_VERSION = 5;

/** Name of the data directory (global under the home directory, local under a project). */
export const DATA_DIR_NAME = '.trellis';

/** Graph document file inside a data directory. */
export const GRAPH_FILE = 'graph.yaml';

/** Config file inside a data directory. */
export const CONFIG_FILE = 'config.json';

/** File extension of saved blueprints. */
export const BLUEPRINT_EXTENSION = '.yaml';
