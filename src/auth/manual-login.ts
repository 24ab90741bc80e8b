import { createInterface } from 'node:readline/promises';
import { createLogger } from '../utils/logger.js';

const log = createLogger('manual-login');

export type Prompt = (question: string, signal?: AbortSignal) => Promise<string>;

export const askOnStdin: Prompt = async (question, signal) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question, signal ? { signal } : {});
  } finally {
    rl.close();
  }
};

/**
 * Operator-assisted login: prints the authorization URL and reads back the URL
 * the browser was redirected to.
 */
export class ManualCodeSource {
  constructor(
    private prompt: Prompt = askOnStdin,
    private print: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
  ) {}

  async obtainRedirectUrl(authUrl: string, signal?: AbortSignal): Promise<string> {
    log.info('Waiting for operator to complete the broker login');
    this.print('Open this URL in a browser and complete the login:');
    this.print(authUrl);
    const answer = await this.prompt('Paste the full URL you were redirected to: ', signal);
    return answer.trim();
  }
}
