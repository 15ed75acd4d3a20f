#!/usr/bin/env node
import { OpenAIChatClient } from './chat/openai.js';
import { ExternalEditor, parseEditorCommand } from './editor/external.js';
import { runClai } from './run.js';

process.exitCode = await runClai(process.argv.slice(2), {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createEditor: (command) => new ExternalEditor(parseEditorCommand(command)),
  createChatClient: (opts) => new OpenAIChatClient(opts),
});
