import { spawn } from 'node:child_process';
import {
  errorMessage,
  fatal,
  isAbortError,
  ok,
  retryable,
  type GenerateRequest,
  type GenerateResult,
  type TextBackend,
} from './textBackend.js';

export interface LocalProcessOptions {
  name: string;
  command: string;
  args: string[];
  model: string;
}

/**
 * Runs a local LLM command line (claude, ollama, ...). The prompt goes to
 * stdin and stdout is returned as the response content.
 */
export class LocalProcessBackend implements TextBackend {
  readonly name: string;
  readonly model: string;

  constructor(private readonly options: LocalProcessOptions) {
    this.name = options.name;
    this.model = options.model;
  }

  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult> {
    const prompt = `${request.systemPrompt}\n\n${request.userPayload}`;

    return new Promise((resolve) => {
      const child = spawn(this.options.command, this.options.args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        signal,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      const settle = (result: GenerateResult) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.once('error', (error: NodeJS.ErrnoException) => {
        if (isAbortError(error)) {
          settle(retryable(`${this.name} aborted`));
        } else if (error.code === 'ENOENT') {
          settle(fatal(`${this.name} not found at: ${this.options.command}`));
        } else {
          settle(fatal(`${this.name} failed to start: ${errorMessage(error)}`));
        }
      });

      child.once('close', (code) => {
        if (code === 0) {
          settle(ok(Buffer.concat(stdout).toString('utf-8').trim()));
        } else {
          const detail = Buffer.concat(stderr).toString('utf-8').trim() || 'Unknown error';
          settle(fatal(`${this.name} exited with code ${code}: ${detail.slice(0, 200)}`));
        }
      });

      // EPIPE when the process exits before reading its input; the close
      // handler reports the exit.
      child.stdin.on('error', (error) => {
        console.warn(`[LLM] ${this.name} stdin error: ${errorMessage(error)}`);
      });
      child.stdin.end(prompt);
    });
  }
}
