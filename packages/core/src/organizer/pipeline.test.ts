import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SuggestionService } from '../agents/llm-client';
import type { OrganizerConfig } from '../config/schema';
import type { WatchSource } from '../indexer/watcher';
import { compileRules, type Rule } from '../planner/rule-matcher';
import { OrganizerPipeline } from './pipeline';

class ManualWatchSource implements WatchSource {
  private active = false;
  start(): void {
    this.active = true;
  }
  stop(): void {
    this.active = false;
  }
  isWatching(): boolean {
    return this.active;
  }
}

function fakeService(respond: (prompt: string) => Promise<string>): SuggestionService & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    suggest(_model, prompt) {
      prompts.push(prompt);
      return respond(prompt);
    },
  };
}

describe('OrganizerPipeline', () => {
  let root: string;
  let pipeline: OrganizerPipeline | null;

  function makeConfig(overrides: {
    rules?: Rule[];
    suggestions?: boolean;
    preserveStructure?: boolean;
    exactNames?: string[];
    settleDelayMs?: number;
  } = {}): OrganizerConfig {
    return {
      root,
      settleDelayMs: overrides.settleDelayMs ?? 0,
      preserveStructure: overrides.preserveStructure ?? false,
      knowledgeBase: '',
      ignore: { useOsDefaults: true, exactNames: overrides.exactNames ?? [], extensions: ['.part'], pathSubstrings: [] },
      rules: compileRules(overrides.rules ?? []),
      suggestions: {
        enabled: overrides.suggestions ?? false,
        model: 'test-model',
        instructions: 'Pick a folder.',
        rateLimitMs: 0,
        queueCapacity: 4,
      },
    };
  }

  function startPipeline(config: OrganizerConfig, service?: SuggestionService): OrganizerPipeline {
    pipeline = new OrganizerPipeline({ config, service, createWatchSource: () => new ManualWatchSource() });
    pipeline.start();
    return pipeline;
  }

  async function arrive(name: string, content = 'data'): Promise<string> {
    const file = path.join(root, name);
    await fs.promises.writeFile(file, content);
    return file;
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'sortbox-pipeline-'));
    pipeline = null;
  });

  afterEach(async () => {
    await pipeline?.stop();
    await fs.promises.rm(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('files a rule match without asking the suggestion service', async () => {
    const service = fakeService(async () => 'Elsewhere');
    const p = startPipeline(
      makeConfig({
        suggestions: true,
        rules: [{ pattern: '.*invoice.*\\.pdf$', destination: 'Documents/Finance/Invoices' }],
      }),
      service
    );
    const file = await arrive('project_invoice_2024.pdf');

    const outcome = await p.handleEvent({ type: 'create', path: file });

    const expected = path.join(root, 'Documents', 'Finance', 'Invoices', 'project_invoice_2024.pdf');
    expect(outcome).toEqual({
      kind: 'placed',
      destination: 'Documents/Finance/Invoices',
      source: 'rule',
      placement: { status: 'moved', destinationPath: expected },
    });
    expect(fs.existsSync(expected)).toBe(true);
    expect(service.prompts).toHaveLength(0);
  });

  it('sends an unmatched file to Unsorted when suggestions are off', async () => {
    const p = startPipeline(makeConfig());
    const file = await arrive('notes.xyz');

    const outcome = await p.handleEvent({ type: 'create', path: file });

    expect(outcome).toMatchObject({ kind: 'placed', destination: 'Unsorted', source: 'fallback' });
    expect(fs.existsSync(path.join(root, 'Unsorted', 'notes.xyz'))).toBe(true);
  });

  it('uses the trimmed suggestion as the destination', async () => {
    const p = startPipeline(makeConfig({ suggestions: true }), fakeService(async () => '  Work/Reports  '));
    const file = await arrive('q3-summary.docx');

    const outcome = await p.handleEvent({ type: 'create', path: file });

    expect(outcome).toMatchObject({ kind: 'placed', destination: 'Work/Reports', source: 'suggestion' });
    expect(fs.existsSync(path.join(root, 'Work', 'Reports', 'q3-summary.docx'))).toBe(true);
  });

  it('falls back to Unsorted when the suggestion service fails', async () => {
    const service = fakeService(async () => {
      throw new Error('quota exceeded');
    });
    const p = startPipeline(makeConfig({ suggestions: true }), service);
    const file = await arrive('mystery.bin');

    const outcome = await p.handleEvent({ type: 'create', path: file });

    expect(outcome).toMatchObject({ kind: 'placed', destination: 'Unsorted' });
    expect(fs.existsSync(path.join(root, 'Unsorted', 'mystery.bin'))).toBe(true);
    expect(service.prompts).toHaveLength(1);
  });

  it('leaves the file in place when preserving structure and the folder does not exist', async () => {
    const p = startPipeline(
      makeConfig({ preserveStructure: true, rules: [{ pattern: 'bill', destination: 'Invoices' }] })
    );
    const file = await arrive('bill.pdf');

    const outcome = await p.handleEvent({ type: 'create', path: file });

    expect(outcome).toMatchObject({ kind: 'placed', destination: 'Invoices', placement: { status: 'skipped' } });
    expect(fs.existsSync(file)).toBe(true);
  });

  it('ignores hidden-marker files, OS files, configured names and extensions', async () => {
    const p = startPipeline(makeConfig({ exactNames: ['keep.me'] }));
    const names = ['._resource', '.DS_Store', 'keep.me', 'movie.part'];

    for (const name of names) {
      const file = await arrive(name);
      expect(await p.handleEvent({ type: 'create', path: file })).toEqual({ kind: 'ignored' });
      expect(fs.existsSync(file)).toBe(true);
    }
    expect(fs.existsSync(path.join(root, 'Unsorted'))).toBe(false);
  });

  it('drops directories, nested paths and non-create events', async () => {
    const p = startPipeline(makeConfig());
    const dir = path.join(root, 'Incoming');
    await fs.promises.mkdir(path.join(dir, 'deeper'), { recursive: true });
    const nested = path.join(dir, 'inner.txt');
    await fs.promises.writeFile(nested, 'x');
    const file = await arrive('changed.txt');

    expect(await p.handleEvent({ type: 'create', path: dir })).toEqual({ kind: 'dropped', reason: 'directory' });
    expect(await p.handleEvent({ type: 'create', path: nested })).toMatchObject({ kind: 'dropped' });
    expect(await p.handleEvent({ type: 'other', path: file })).toMatchObject({ kind: 'dropped' });
    expect(fs.existsSync(nested)).toBe(true);
    expect(fs.existsSync(file)).toBe(true);
  });

  it('drops a file that vanished during the settle delay', async () => {
    const p = startPipeline(makeConfig());
    const outcome = await p.handleEvent({ type: 'create', path: path.join(root, 'ghost.txt') });
    expect(outcome).toEqual({ kind: 'dropped', reason: 'file no longer exists' });
  });

  it('handles events strictly in arrival order, one at a time', async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const service = fakeService(async (prompt) => {
      if (prompt.includes('Filename: slow.txt')) {
        order.push('slow:start');
        await firstGate;
        order.push('slow:end');
        return 'Slow';
      }
      order.push('fast');
      return 'Fast';
    });
    const p = startPipeline(makeConfig({ suggestions: true }), service);

    const slow = await arrive('slow.txt');
    const fast = await arrive('fast.txt');
    const first = p.handleEvent({ type: 'create', path: slow });
    const second = p.handleEvent({ type: 'create', path: fast });

    await vi.waitFor(() => expect(order).toEqual(['slow:start']));
    releaseFirst();

    expect(await first).toMatchObject({ destination: 'Slow' });
    expect(await second).toMatchObject({ destination: 'Fast' });
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a failed placement', async () => {
    const p = startPipeline(makeConfig({ rules: [{ pattern: 'blocked', destination: 'Wall/Inner' }] }));
    await arrive('Wall');
    const blocked = await arrive('blocked.txt');
    const next = await arrive('next.txt');

    const first = p.handleEvent({ type: 'create', path: blocked });
    const second = p.handleEvent({ type: 'create', path: next });

    expect(await first).toMatchObject({ kind: 'placed', placement: { status: 'failed' } });
    expect(await second).toMatchObject({ kind: 'placed', destination: 'Unsorted', placement: { status: 'moved' } });
    expect(fs.existsSync(blocked)).toBe(true);
  });

  it('resolves a pending suggestion to Unsorted when stopped', async () => {
    let called = false;
    const service: SuggestionService = {
      suggest(_model, _prompt, signal) {
        called = true;
        return new Promise<string>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
      },
    };
    const p = startPipeline(makeConfig({ suggestions: true }), service);
    const file = await arrive('pending.txt');

    const outcome = p.handleEvent({ type: 'create', path: file });
    await vi.waitFor(() => expect(called).toBe(true));
    await p.stop();
    pipeline = null;

    expect(await outcome).toMatchObject({ kind: 'placed', destination: 'Unsorted' });
    expect(fs.existsSync(path.join(root, 'Unsorted', 'pending.txt'))).toBe(true);
  });

  it('leaves files that were still waiting behind a pending suggestion in place when stopped', async () => {
    let calls = 0;
    const service: SuggestionService = {
      suggest(_model, _prompt, signal) {
        calls++;
        return new Promise<string>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
      },
    };
    const p = startPipeline(makeConfig({ suggestions: true }), service);
    const first = await arrive('first.txt');
    const second = await arrive('second.txt');

    const firstOutcome = p.handleEvent({ type: 'create', path: first });
    const secondOutcome = p.handleEvent({ type: 'create', path: second });
    await vi.waitFor(() => expect(calls).toBe(1));
    await p.stop();
    pipeline = null;

    expect(await firstOutcome).toMatchObject({ kind: 'placed', destination: 'Unsorted' });
    expect(await secondOutcome).toEqual({ kind: 'dropped', reason: 'stopping' });
    expect(fs.existsSync(second)).toBe(true);
    expect(calls).toBe(1);
  });

  it('cuts the settle delay short when stopped', async () => {
    const p = startPipeline(makeConfig({ settleDelayMs: 60_000 }));
    const file = await arrive('settling.txt');

    const outcome = p.handleEvent({ type: 'create', path: file });
    await new Promise((resolve) => setTimeout(resolve, 50));
    await p.stop();
    pipeline = null;

    expect(await outcome).toEqual({ kind: 'dropped', reason: 'stopping' });
    expect(fs.existsSync(file)).toBe(true);
  });

  it('drops events handed in after stop', async () => {
    const p = startPipeline(makeConfig());
    const file = await arrive('late.txt');
    await p.stop();
    pipeline = null;

    expect(await p.handleEvent({ type: 'create', path: file })).toEqual({ kind: 'dropped', reason: 'stopping' });
    expect(fs.existsSync(file)).toBe(true);
  });

  it('starts and stops its watch source', async () => {
    const p = startPipeline(makeConfig());
    expect(p.isWatching()).toBe(true);
    await p.stop();
    pipeline = null;
    expect(p.isWatching()).toBe(false);
  });
});
