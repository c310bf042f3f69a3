import type { PostIndexConfig } from './types.js';

export const CONFIG_FILE_NAME = '.postindex.json';

export const DEFAULT_CONFIG: PostIndexConfig = {
  version: 1,
  content: {
    root: '.',
    postsDir: '_posts',
    extensions: ['.md', '.markdown'],
    exclude: ['_site', 'node_modules', 'vendor'],
  },
  output: {
    indexPath: '_data/navigation.json',
  },
  log: {
    level: 'info',
  },
};
