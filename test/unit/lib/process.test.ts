import { runCaptured, runInteractive } from '@/lib/process';

const node = process.execPath;

describe('process helpers', () => {
  describe('runCaptured', () => {
    it('should capture stdout of a successful run', async () => {
      expect(await runCaptured(node, ['-e', 'process.stdout.write("hello")'])).toEqual({
        stdout: 'hello',
        stderr: '',
        exitCode: 0,
        timedOut: false,
      });
    });

    it('should capture stderr and the exit code of a failed run', async () => {
      expect(await runCaptured(node, ['-e', 'process.stderr.write("bad"); process.exit(3)'])).toEqual({
        stdout: '',
        stderr: 'bad',
        exitCode: 3,
        timedOut: false,
      });
    });

    it('should stop a run that exceeds its deadline', async () => {
      const result = await runCaptured(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBeNull();
      expect(result.spawnError).toBeUndefined();
    });

    it('should describe a command that cannot be started', async () => {
      const result = await runCaptured('/nonexistent/binary', []);

      expect(result.exitCode).toBeNull();
      expect(result.timedOut).toBe(false);
      expect(result.spawnError).toBe('spawn /nonexistent/binary ENOENT');
    });

    it('should pass the given environment', async () => {
      const result = await runCaptured(node, ['-e', 'process.stdout.write(process.env.MULTIKUBE_TEST_VALUE || "")'], {
        env: { ...process.env, MULTIKUBE_TEST_VALUE: 'test-value' },
      });

      expect(result.stdout).toBe('test-value');
    });
  });

  describe('runInteractive', () => {
    it('should succeed when the command exits with 0', async () => {
      expect(await runInteractive(node, ['-e', 'process.exit(0)'])).toEqual({ ok: true, value: undefined });
    });

    it('should report a non-zero exit code', async () => {
      const result = await runInteractive(node, ['-e', 'process.exit(2)']);

      expect(result.ok ? undefined : result.error).toBe(`${node} -e process.exit(2) exited with code 2`);
    });

    it('should report a command that cannot be started', async () => {
      const result = await runInteractive('/nonexistent/binary', []);

      expect(result.ok ? undefined : result.error).toBe('Failed to start /nonexistent/binary: spawn /nonexistent/binary ENOENT');
    });
  });
});
