import { parseArguments } from './args.js';
import type { ChatClient } from './chat/index.js';
import type { OpenAIChatClientOptions } from './chat/openai.js';
import { buildMessages } from './chat/prompt.js';
import { loadConfig, resolveApiKey, resolveEditorCommand, resolvePath, type Env } from './config.js';
import type { Editor } from './editor/index.js';
import { UsageError } from './errors.js';
import { extractContent, formatResponse } from './format.js';
import { initLogger, log } from './logger.js';

export interface ClaiDeps {
  env: Env;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile?: (path: string) => string;
  createEditor: (command: string) => Editor;
  createChatClient: (opts: OpenAIChatClientOptions) => ChatClient;
}

/**
 * Run one invocation end to end and resolve with the process exit code.
 */
export async function runClai(argv: string[], deps: ClaiDeps): Promise<number> {
  try {
    const parsed = parseArguments(argv, { readFile: deps.readFile, writeOut: deps.stdout });
    if (parsed.kind === 'displayed') {
      return 0;
    }
    const { invocation } = parsed;
    initLogger(invocation.verbose);

    const configPath = resolvePath(invocation.configPath, deps.env);
    const config = loadConfig(configPath);
    log(`Config: ${configPath}`);

    const inputText =
      invocation.inputText ?? (await deps.createEditor(resolveEditorCommand(config, deps.env)).editText());

    const apiKey = resolveApiKey({ env: deps.env, keyFile: config.chat.key_file });
    const messages = buildMessages({
      inputText,
      language: invocation.language,
      context: invocation.context,
      systemPrompt: config.chat.system_prompt,
    });

    const client = deps.createChatClient({
      apiKey,
      model: invocation.model ?? config.chat.model,
      endpoint: config.chat.endpoint,
      writeErr: deps.stderr,
    });
    const body = await client.completeChat(messages);

    const lines = formatResponse(extractContent(body), invocation.language);
    if (invocation.language !== undefined) {
      log(`Extracted ${lines.length} ${invocation.language} code block(s)`);
    }
    for (const line of lines) {
      deps.stdout(`${line}\n`);
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      deps.stderr(`${err.message}\n`);
      deps.stdout(err.usage);
      return 1;
    }
    deps.stderr(`[clai] ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
