import type { NoteLinkConfig } from './types.js';

export const CONFIG_FILE_NAME = '.notelink.json';

export const DEFAULT_CONFIG: NoteLinkConfig = {
  version: 1,
  notes: {
    root: '~/Documents/Notes',
    extensions: ['md', 'org', 'txt'],
    archiveDir: 'Archive',
    indexFileName: 'INDEX.md',
    noteTypes: {
      daily: 'daily',
      quick: 'quick',
      projects: 'project',
      people: 'person',
      reading: 'reading',
    },
  },
  scan: {
    junkPatterns: [
      '.git',
      '.DS_Store',
      '._*',
      '.Trashes',
      '.Trash*',
      '.Spotlight-V100',
      '.fseventsd',
      '.TemporaryItems',
      '.AppleDouble',
      '.continuity',
      'node_modules',
      '__pycache__',
      'Templates',
      'Archive',
      '*.tmp',
      '*.bak',
      '*~',
    ],
    scanner: 'walk',
    searcher: 'scan',
  },
  cache: {
    ttlSeconds: 300, // 5 分鐘
  },
  rename: {
    backupByDefault: false,
    rollbackOnFailure: false,
  },
  logging: {
    level: 'info',
  },
};
