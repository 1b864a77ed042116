import { packageTools } from '../../../src/tools/packages/index.js';
import type { PluginContext } from '../../../src/tools/context.js';
import type { RegisteredTool } from '../../../src/types/tool.js';
import { FakeExecutor, SLAPT, report, slaptContext } from '../../fixtures/fake-executor.js';

function setup(fake: FakeExecutor): RegisteredTool[] {
  const ctx: PluginContext = { slapt: slaptContext(fake), targetHost: 'slackbox' };
  return packageTools(ctx);
}

function tool(tools: RegisteredTool[], name: string): RegisteredTool {
  const found = tools.find((t) => t.metadata.name === name);
  if (!found) throw new Error(`tool ${name} not defined`);
  return found;
}

describe('packageTools', () => {
  it('defines both tools in listing order', () => {
    expect(setup(new FakeExecutor()).map((t) => t.metadata.name)).toEqual(['slapt_reconcile', 'slapt_query']);
  });

  it('marks only slapt_query as read-only', () => {
    const tools = setup(new FakeExecutor());
    expect(tool(tools, 'slapt_query').metadata.annotations?.readOnlyHint).toBe(true);
    expect(tool(tools, 'slapt_reconcile').metadata.annotations?.readOnlyHint).toBe(false);
  });
});

describe('slapt_reconcile', () => {
  it('returns the change report and the commands it ran', async () => {
    const fake = new FakeExecutor().on('--simulate', { stdout: report({ install: ['iptables-1.8.4-x86_64-1'] }) });
    const tools = setup(fake);

    const response = await tool(tools, 'slapt_reconcile').execute({ package: ['iptables'] });

    expect(response).toMatchObject({
      status: 'success',
      tool: 'slapt_reconcile',
      target_host: 'slackbox',
      check_mode: false,
      commands_executed: [
        `${SLAPT} --simulate --install --no-upgrade iptables`,
        `${SLAPT} --install --no-upgrade iptables-1.8.4-x86_64-1`,
      ],
      data: {
        changed: true,
        packages: { installed: ['iptables-1.8.4-x86_64-1'], upgraded: [], removed: [] },
      },
    });
  });

  it('rejects invalid combinations before running anything', async () => {
    const fake = new FakeExecutor();
    const tools = setup(fake);

    const response = await tool(tools, 'slapt_reconcile').execute({ package: ['vim'], upgrade: 'yes' });

    expect(response).toMatchObject({ status: 'error', error_code: 'INVALID_REQUEST', error_category: 'validation' });
    expect(fake.calls).toHaveLength(0);
  });

  it('turns a failed cache update into an error response', async () => {
    const fake = new FakeExecutor().on('--update', { exitCode: 1, stderr: 'Failed to download: CHECKSUMS.md5' });
    const tools = setup(fake);

    const response = await tool(tools, 'slapt_reconcile').execute({ update_cache: true });

    expect(response).toMatchObject({
      status: 'error',
      error_code: 'CACHE_UPDATE_FAILED',
      message: 'Failed to update cache',
      exit_code: 1,
      stderr: 'Failed to download: CHECKSUMS.md5',
      commands_executed: [`${SLAPT} --update`],
    });
  });
});

describe('slapt_query', () => {
  it('reports installed state and candidates', async () => {
    const fake = new FakeExecutor().on('--search', {
      stdout: 'vim-9.0.2-x86_64-1 [inst=yes]: vim (Vi IMproved)\nvim-9.1.0-x86_64-1 [inst=no]: vim (Vi IMproved)\n',
    });
    const tools = setup(fake);

    const response = await tool(tools, 'slapt_query').execute({ package: 'vim', latest: true });

    expect(response).toMatchObject({
      status: 'success',
      commands_executed: [`${SLAPT} --search ^vim-`],
      data: {
        package: 'vim',
        installed: false,
        candidates: [
          { id: 'vim-9.1.0-x86_64-1', version: '9.1.0', arch: 'x86_64', build: '1', installed: false },
          { id: 'vim-9.0.2-x86_64-1', version: '9.0.2', arch: 'x86_64', build: '1', installed: true },
        ],
      },
    });
  });

  it('validates its input', async () => {
    const response = await tool(setup(new FakeExecutor()), 'slapt_query').execute({ package: '' });
    expect(response).toMatchObject({ status: 'error', error_code: 'INVALID_REQUEST' });
  });
});
