import type { Migration } from '../migrator.js';
import { migration as m001 } from './001_create_users_and_podcasts.js';
import { migration as m002 } from './002_create_episode_guides.js';
import { migration as m003 } from './003_create_custom_options.js';

export const migrations: Migration[] = [m001, m002, m003];
