import { join } from 'path';
import { existsSync } from 'fs';

/**
 * Gets the correct base path for static resources (prompt templates)
 * In development: uses src/ folder
 * In production: uses dist/ folder (after build with copyfiles -u 1 which strips the src/ prefix)
 */
export function getResourceBasePath(): string {
  const cwd = process.cwd();

  const srcExists = existsSync(join(cwd, 'src'));
  const distPromptsExists = existsSync(join(cwd, 'dist', 'prompts'));
  const isRunningFromDist = __filename.includes('dist/') || __filename.includes('dist\\');
  const isProduction = process.env.NODE_ENV === 'production';

  if (isProduction || isRunningFromDist || (!srcExists && distPromptsExists)) {
    return join(cwd, 'dist');
  }
  return join(cwd, 'src');
}

/**
 * Gets the path to the prompts directory
 */
export function getPromptsPath(): string {
  return join(getResourceBasePath(), 'prompts');
}
