/**
 * Package version
 * Read from package.json next to src/ and dist/
 */

import { createRequire } from 'module';
import { z } from 'zod';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

export const VERSION = pkg.version;
