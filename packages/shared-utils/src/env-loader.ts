import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'dotenv';

function applyEnvFile(filePath: string, loadedByFile: Set<string>): void {
  if (!existsSync(filePath)) return;
  const raw = readFileSync(filePath, 'utf8');
  const parsed = parse(raw);

  for (const [key, value] of Object.entries(parsed)) {
    // Shell values win; between files, .env.local overrides .env.
    if (process.env[key] === undefined || loadedByFile.has(key)) {
      process.env[key] = value;
      loadedByFile.add(key);
    }
  }
}

export function loadEnvFiles(dir: string = process.cwd()): void {
  const loadedByFile = new Set<string>();

  applyEnvFile(join(dir, '.env'), loadedByFile);
  applyEnvFile(join(dir, '.env.local'), loadedByFile);
}

loadEnvFiles();
