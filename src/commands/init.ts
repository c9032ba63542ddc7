/**
 * Init Command
 *
 * Create .docmark/ with a default config and keep backups out of git.
 */

import { mkdir, writeFile, access, readFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import { hasErrorCode } from '../errors.js';
import { CONFIG_FILE, STATE_DIR, defaultConfig, dumpConfig } from '../config/config.js';

interface InitOptions {
  force?: boolean;
}

const GITIGNORE_ENTRY = `${STATE_DIR}/backups/`;

const GITIGNORE_BLOCK = `
# docmark
${GITIGNORE_ENTRY}
`;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  const stateDir = join(cwd, STATE_DIR);
  const configPath = join(stateDir, CONFIG_FILE);

  console.log(chalk.cyan('\n  Initializing docmark...\n'));

  if (await exists(configPath)) {
    if (!options.force) {
      console.log(chalk.yellow('  docmark already initialized.'));
      console.log(chalk.dim('  Use --force to reinitialize.\n'));
      return;
    }
    console.log(chalk.dim('  Reinitializing (--force)...\n'));
  }

  await mkdir(stateDir, { recursive: true });
  await writeFile(
    configPath,
    `# docmark configuration
# Paths are relative to the project root.

${dumpConfig(defaultConfig())}`,
  );
  console.log(chalk.green(`  ✓ Created ${STATE_DIR}/${CONFIG_FILE}`));

  const gitignorePath = join(cwd, '.gitignore');
  let existing: string | null = null;
  try {
    existing = await readFile(gitignorePath, 'utf-8');
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) throw error;
  }
  if (existing === null) {
    await writeFile(gitignorePath, GITIGNORE_BLOCK.trimStart());
    console.log(chalk.green('  ✓ Created .gitignore'));
  } else if (!existing.split(/\r?\n/).includes(GITIGNORE_ENTRY)) {
    const separator = existing === '' || existing.endsWith('\n') ? '' : '\n';
    await writeFile(gitignorePath, existing + separator + GITIGNORE_BLOCK);
    console.log(chalk.green('  ✓ Updated .gitignore'));
  }

  console.log(chalk.cyan('\n  docmark initialized successfully!\n'));
  console.log(chalk.dim('  Next steps:'));
  console.log(chalk.dim(`    1. Review ${STATE_DIR}/${CONFIG_FILE}`));
  console.log(chalk.dim('    2. Add # @llm-doc-start / # @llm-doc-end markers to your code'));
  console.log(chalk.dim('    3. Run `docmark scan`\n'));
}
