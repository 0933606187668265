import { vi } from 'vitest';

// ESM namespaces of Node built-ins are sealed, so `vi.spyOn(fs, ...)` cannot
// redefine their properties. Re-export the real module as a plain object.
vi.mock('node:fs', async (importOriginal) => ({ ...(await importOriginal<typeof import('node:fs')>()) }));
