/**
 * Package version
 * Single source of truth — read from package.json at run time
 */

import { createRequire } from 'module';
import { z } from 'zod';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

export const VERSION = pkg.version;
