import type { PullcraftConfig } from './schema.js';
import { DEFAULT_REMOTE_PRIORITY } from '../resolve/target.js';

export const DEFAULT_CONFIG: PullcraftConfig = {
  github: {
    host: 'github.com',
    apiUrl: 'https://api.github.com',
  },
  remotes: {
    priority: [...DEFAULT_REMOTE_PRIORITY],
  },
  logLevel: 'warn',
};
