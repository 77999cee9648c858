import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'node:stream';
import { SpinnerService } from './spinner-service';

function captureStream(): { stream: Writable; lines: () => string[] } {
  let output = '';
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      output += chunk.toString();
      callback();
    },
  });
  return { stream, lines: () => output.split('\n').filter((line) => line.length > 0) };
}

describe('SpinnerService', () => {
  let capture: ReturnType<typeof captureStream>;

  beforeEach(() => {
    capture = captureStream();
  });

  describe('track', () => {
    it('should print the start and success lines without a TTY', async () => {
      const service = new SpinnerService({ isTTY: false, stream: capture.stream });

      const value = await service.track('Waiting for cluster Sandbox-demo', async () => 42, 'Cluster Sandbox-demo is active');

      expect(value).toBe(42);
      expect(capture.lines()).toEqual(['> Waiting for cluster Sandbox-demo', '✅ Cluster Sandbox-demo is active']);
    });

    it('should reuse the start text when no success text is given', async () => {
      const service = new SpinnerService({ isTTY: false, stream: capture.stream });

      await service.track('Deleting', async () => undefined);

      expect(capture.lines()).toEqual(['> Deleting', '✅ Deleting']);
    });

    it('should mark the spinner failed and rethrow the task error', async () => {
      const service = new SpinnerService({ isTTY: false, stream: capture.stream });
      const failure = new Error('timed out');

      await expect(
        service.track('Waiting', async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(capture.lines()).toEqual(['> Waiting', '❌ Waiting']);
      expect(service.getActive()).toBeNull();
    });

    it('should print nothing in quiet mode', async () => {
      const service = new SpinnerService({ quiet: true, isTTY: false, stream: capture.stream });

      await service.track('Waiting', async () => 'done');

      expect(capture.lines()).toEqual([]);
    });
  });

  describe('create', () => {
    it('should stop the previous spinner when a new one starts', () => {
      const service = new SpinnerService({ isTTY: false, stream: capture.stream });
      const first = service.start('first');

      service.start('second');

      expect(first.isSpinning).toBe(false);
      expect(service.getActive()?.isSpinning).toBe(true);
    });

    it('should write text updates while spinning', () => {
      const service = new SpinnerService({ isTTY: false, stream: capture.stream });
      const spinner = service.create({ text: 'one', prefixSymbol: '*' });

      spinner.start();
      spinner.setText('two');
      spinner.stop();
      spinner.setText('three');

      expect(capture.lines()).toEqual(['* one', '* two']);
    });
  });
});
