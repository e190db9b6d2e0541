import { ProcessRunner } from '../src/clients/ProcessRunner';

describe('ProcessRunner with a real child process', () => {
  const runner = new ProcessRunner();

  it('should resolve with the exit code when the child exits without reading stdin', async () => {
    const input = '0 2 * * * npx odoo-backup\n'.repeat(40000);

    for (let attempt = 0; attempt < 5; attempt++) {
      const result = await runner.run('sh', ['-c', 'exec 0<&-; echo "not allowed" >&2; exit 1'], { input });

      expect(result).toEqual({ exitCode: 1, stdout: '', stderr: 'not allowed\n' });
    }
  });

  it('should pass input through to the child', async () => {
    const result = await runner.run('sh', ['-c', 'cat'], { input: '0 2 * * * job\n' });

    expect(result).toEqual({ exitCode: 0, stdout: '0 2 * * * job\n', stderr: '' });
  });
});
