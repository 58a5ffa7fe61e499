import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createAdrCommand } from './commands/adr.js';
import { createEvidenceCommand } from './commands/evidence.js';
import { createCommitMsgCommand } from './commands/commit-msg.js';
import { createChangelogCommand } from './commands/changelog.js';
import { createTermsCommand } from './commands/terms.js';
import { createLinksCommand } from './commands/links.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return '0.0.0';
}

const VERSION = readVersion();

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('govkit')
    .description('Documentation governance checks for ADRs, evidence and commits')
    .version(VERSION)
    .enablePositionalOptions();
  [createAdrCommand, createEvidenceCommand, createCommitMsgCommand, createChangelogCommand,
   createTermsCommand, createLinksCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
