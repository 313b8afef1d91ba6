import { createInterface } from 'node:readline/promises';

import { log } from 'cluster-state';

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

/** --yes */
export const autoConfirm: Confirmer = {
  async confirm(question) {
    log(`[Confirm] ${question} yes (--yes)`);
    return true;
  },
};

/** Interactive y/N prompt; anything but y/yes declines */
export class PromptConfirmer implements Confirmer {
  constructor(
    private readonly input:  NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const answer = await rl.question(`${question} [y/N] `);
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}
