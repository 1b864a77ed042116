import { LocalExecutor, RecordingExecutor, type Executor } from '../../../src/execution/executor.js';

describe('LocalExecutor', () => {
  const executor = new LocalExecutor();

  it('captures stdout, stderr and the exit code', async () => {
    const result = await executor.execute({
      argv: [process.execPath, '-e', "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"],
    }, 10_000);

    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.exitCode).toBe(3);
  });

  it('reports exit code 0 on success', async () => {
    const result = await executor.execute({ argv: [process.execPath, '-e', "process.stdout.write('ok')"] }, 10_000);
    expect(result).toMatchObject({ stdout: 'ok', stderr: '', exitCode: 0 });
  });

  it('merges the command environment over the process environment', async () => {
    const result = await executor.execute({
      argv: [process.execPath, '-e', 'process.stdout.write(process.env.LC_ALL + "/" + typeof process.env.PATH)'],
      env: { LC_ALL: 'C' },
    }, 10_000);
    expect(result.stdout).toBe('C/string');
  });

  it('resolves with 127 instead of throwing when the binary is missing', async () => {
    const result = await executor.execute({ argv: ['/nonexistent/slapt-get', '--update'] }, 10_000);
    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain('ENOENT');
  });

  it('reports the timeout when it kills a run', async () => {
    const result = await executor.execute({ argv: [process.execPath, '-e', 'setTimeout(() => {}, 10_000)'] }, 200);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('killed by SIGTERM after the 200 ms timeout');
  });

  it('reports the signal when the process is killed from outside', async () => {
    const result = await executor.execute({
      argv: [process.execPath, '-e', "process.stderr.write('partial\\n'); process.kill(process.pid, 'SIGKILL')"],
    }, 10_000);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('partial\nkilled by SIGKILL');
  });

  it('resolves with 127 for an empty argv', async () => {
    await expect(executor.execute({ argv: [] }, 0)).resolves.toMatchObject({ exitCode: 127 });
  });
});

describe('RecordingExecutor', () => {
  it('records command lines and delegates', async () => {
    const execute = jest.fn<ReturnType<Executor['execute']>, Parameters<Executor['execute']>>()
      .mockImplementation(async () => ({ stdout: 'x', stderr: '', exitCode: 0, durationMs: 1 }));
    const recording = new RecordingExecutor({ execute });

    const result = await recording.execute({ argv: ['/usr/sbin/slapt-get', '--update'] }, 500);

    expect(result.stdout).toBe('x');
    expect(recording.executed).toEqual(['/usr/sbin/slapt-get --update']);
    expect(execute).toHaveBeenCalledWith({ argv: ['/usr/sbin/slapt-get', '--update'] }, 500);
  });
});
