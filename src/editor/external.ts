import { spawn } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EditorError } from '../errors.js';
import { log } from '../logger.js';
import type { Editor } from './index.js';

export interface ExternalEditorOptions {
  command: string;
  args?: string[];
  /** Parent directory for the scratch file. Defaults to the OS temp dir. */
  tmpDir?: string;
}

/**
 * Split a configured editor command such as `code --wait` into
 * executable and arguments.
 */
export function parseEditorCommand(command: string): ExternalEditorOptions {
  const [executable, ...args] = command.trim().split(/\s+/);
  if (!executable) {
    throw new EditorError('Editor command is empty');
  }
  return { command: executable, args };
}

/**
 * Opens an interactive editor on a scratch file and reads it back once the
 * editor exits. The scratch directory is removed on every exit path.
 */
export class ExternalEditor implements Editor {
  private command: string;
  private args: string[];
  private tmpDir: string;

  constructor(opts: ExternalEditorOptions) {
    this.command = opts.command;
    this.args = opts.args ?? [];
    this.tmpDir = opts.tmpDir ?? tmpdir();
  }

  async editText(initialContent = ''): Promise<string> {
    const dir = mkdtempSync(join(this.tmpDir, 'clai-'));
    const filePath = join(dir, 'input.md');

    try {
      writeFileSync(filePath, initialContent, 'utf-8');
      await this.launch(filePath);

      const content = readFileSync(filePath, 'utf-8');
      if (content.trim() === '') {
        throw new EditorError('No content was written in the editor.');
      }
      return content;
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }

  private launch(filePath: string): Promise<void> {
    log(`Launching editor: ${this.command} ${[...this.args, filePath].join(' ')}`);

    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, [...this.args, filePath], { stdio: 'inherit' });

      proc.on('close', (code, signal) => {
        if (signal) {
          reject(new EditorError(`Editor '${this.command}' was killed by ${signal}`));
          return;
        }
        if (code !== 0) {
          reject(new EditorError(`Editor '${this.command}' exited with code ${code}`));
          return;
        }
        resolve();
      });
      proc.on('error', (err) => {
        reject(new EditorError(`Failed to launch editor '${this.command}': ${err.message}`));
      });
    });
  }
}
