/**
 * Temp-directory repositories for file-backed tests.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

/** The repository's own rule configs, relative to its root. */
export const ARCHITECTURE_CONFIGS = [
  'architecture/architecture.config.yaml',
  'architecture/adr/adr_config.yaml',
  'architecture/evidence/evidence.config.yaml',
];

export function createTempDir(prefix = 'govkit-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files (repo-relative path to content) under `root`.
 */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, relPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }
}

export function readText(root: string, relPath: string): string {
  return fs.readFileSync(path.join(root, relPath), 'utf-8');
}

/**
 * The project's own package.json "govkit" section.
 */
export function projectManifestSection(): unknown {
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(PROJECT_ROOT, 'package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'govkit' in manifest) {
    return manifest.govkit;
  }
  return {};
}

/**
 * A temp repo with the project's manifest section and rule configs, plus extra files.
 */
export function createGovernedRepo(files: Record<string, string> = {}): string {
  const root = createTempDir();
  writeFiles(root, {
    'package.json': JSON.stringify({ name: 'fixture', govkit: projectManifestSection() }, null, 2),
  });
  for (const relPath of ARCHITECTURE_CONFIGS) {
    writeFiles(root, { [relPath]: fs.readFileSync(path.join(PROJECT_ROOT, relPath), 'utf-8') });
  }
  writeFiles(root, files);
  return root;
}

/**
 * A file from the project checkout, e.g. the sample ADR.
 */
export function readProjectFile(relPath: string): string {
  return fs.readFileSync(path.join(PROJECT_ROOT, relPath), 'utf-8');
}
