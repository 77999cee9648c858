import { describe, it, expect } from 'vitest';
import { InquirerPrompter } from './inquirer-prompter';

describe('InquirerPrompter', () => {
  describe('isInteractive', () => {
    it('should require both interactive mode and a TTY', () => {
      expect(new InquirerPrompter({ interactive: true, isTTY: true }).isInteractive()).toBe(true);
      expect(new InquirerPrompter({ interactive: true, isTTY: false }).isInteractive()).toBe(false);
      expect(new InquirerPrompter({ interactive: false, isTTY: true }).isInteractive()).toBe(false);
    });
  });

  describe('non-interactive mode', () => {
    const prompter = new InquirerPrompter({ interactive: false, isTTY: true });

    it('should answer with the prompt default', async () => {
      expect(await prompter.confirm({ message: 'Delete?', default: false })).toEqual({ ok: true, value: false });
      expect(await prompter.input({ message: 'Name?', default: 'demo' })).toEqual({ ok: true, value: 'demo' });
      expect(await prompter.multiSelect({ message: 'Pick', choices: [], default: ['a'] })).toEqual({
        ok: true,
        value: ['a'],
      });
    });

    it('should fail a confirm without a default', async () => {
      const result = await prompter.confirm({ message: 'Delete?' });

      expect(result).toEqual({
        ok: false,
        error: { code: 'NON_INTERACTIVE', message: 'Cannot ask "Delete?" in non-interactive mode', cause: undefined },
      });
    });

    it('should not pick the first choice of a select without a default', async () => {
      const result = await prompter.select({
        message: 'Which cluster?',
        choices: [
          { name: 'Sandbox-a', value: 'Sandbox-a' },
          { name: 'Sandbox-b', value: 'Sandbox-b' },
        ],
      });

      expect(result.ok).toBe(false);
    });

    it('should fail a multi-select with an empty default', async () => {
      const result = await prompter.multiSelect({ message: 'Subnets', choices: [], default: [] });

      expect(result.ok).toBe(false);
    });
  });
});
