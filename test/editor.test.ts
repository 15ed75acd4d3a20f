import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExternalEditor, parseEditorCommand } from '../src/editor/external.js';
import { EditorError } from '../src/errors.js';

const TEST_DIR = join(tmpdir(), 'clai-test-editor');

// Stands in for an interactive editor: node -e '<script>' <file>
function scriptEditor(script: string): ExternalEditor {
  return new ExternalEditor({ command: process.execPath, args: ['-e', script], tmpDir: TEST_DIR });
}

before(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

after(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('parseEditorCommand', () => {
  it('コマンドと引数に分割する', () => {
    assert.deepEqual(parseEditorCommand('code --wait'), { command: 'code', args: ['--wait'] });
  });

  it('前後の空白を無視する', () => {
    assert.deepEqual(parseEditorCommand('  vim  '), { command: 'vim', args: [] });
  });

  it('空のコマンドはEditorError', () => {
    assert.throws(() => parseEditorCommand('   '), EditorError);
  });
});

describe('ExternalEditor.editText', () => {
  it('エディタが書いた内容を返し、一時ファイルを削除する', async () => {
    const editor = scriptEditor(
      "require('node:fs').appendFileSync(process.argv[1], 'sort a map by value\\n')",
    );
    const text = await editor.editText();
    assert.equal(text, 'sort a map by value\n');
    assert.deepEqual(readdirSync(TEST_DIR), []);
  });

  it('初期内容をファイルに書いてから起動する', async () => {
    const editor = scriptEditor("require('node:fs').appendFileSync(process.argv[1], ' world')");
    assert.equal(await editor.editText('hello'), 'hello world');
  });

  it('エディタが非ゼロで終了したらEditorErrorで、一時ファイルも消える', async () => {
    const editor = scriptEditor(
      "require('node:fs').writeFileSync(process.argv[1], 'draft'); process.exit(3)",
    );
    await assert.rejects(
      () => editor.editText(),
      (err: unknown) => err instanceof EditorError && err.message.endsWith('exited with code 3'),
    );
    assert.deepEqual(readdirSync(TEST_DIR), []);
  });

  it('シグナルで終了したらシグナル名を含むEditorError', async () => {
    const editor = scriptEditor("process.kill(process.pid, 'SIGTERM')");
    await assert.rejects(
      () => editor.editText(),
      (err: unknown) => err instanceof EditorError && err.message.endsWith('was killed by SIGTERM'),
    );
    assert.deepEqual(readdirSync(TEST_DIR), []);
  });

  it('空白だけの内容はEditorErrorで、一時ファイルも消える', async () => {
    const editor = scriptEditor("require('node:fs').writeFileSync(process.argv[1], '  \\n\\t\\n')");
    await assert.rejects(
      () => editor.editText(),
      (err: unknown) => err instanceof EditorError && err.message === 'No content was written in the editor.',
    );
    assert.deepEqual(readdirSync(TEST_DIR), []);
  });

  it('起動できないコマンドはEditorError', async () => {
    const editor = new ExternalEditor({ command: join(TEST_DIR, 'no-such-editor'), tmpDir: TEST_DIR });
    await assert.rejects(
      () => editor.editText(),
      (err: unknown) => err instanceof EditorError && err.message.startsWith('Failed to launch editor'),
    );
    assert.deepEqual(readdirSync(TEST_DIR), []);
  });
});
