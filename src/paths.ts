import path from 'path';
import { fileURLToPath } from 'url';

/** Package root, whether running from src/ or dist/. */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const PROMPTS_DIR = path.join(PACKAGE_ROOT, 'src', 'prompts');
export const SCHEMAS_DIR = path.join(PACKAGE_ROOT, 'src', 'schemas');
