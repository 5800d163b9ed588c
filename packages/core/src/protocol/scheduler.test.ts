import { describe, it, expect } from 'vitest';
import { ScriptRuntime, type GuestScript } from './scheduler.js';
import { GuestOperationError, UnknownRequestIdError } from './errors.js';
import { failure, success } from './types.js';

function makeRuntime(script: GuestScript, toolIdentifiers?: ReadonlyMap<string, string>) {
  let requestId = 0;
  let taskId = 0;
  return new ScriptRuntime(script, {
    nextRequestId: () => ++requestId,
    nextTaskId: () => ++taskId,
    toolIdentifiers,
  });
}

async function nextRequest(runtime: ScriptRuntime) {
  const request = await runtime.step();
  if (!request) throw new Error('expected a request');
  return request;
}

describe('ScriptRuntime', () => {
  describe('step()', () => {
    it('surfaces the first operation as a request and suspends its task', async () => {
      const runtime = makeRuntime((env) => env.call('stripe/charges/create', { amount: 500 }));

      const request = await nextRequest(runtime);
      expect(request).toEqual({
        id: 1,
        taskId: 1,
        kind: { type: 'tool_call', method: 'stripe/charges/create', args: { amount: 500 } },
      });
      expect(runtime.tasks().get(1)).toEqual({ status: 'suspended', requestId: 1 });
      expect(runtime.hasWork()).toBe(true);
    });

    it('returns null when every task waits on the host', async () => {
      const runtime = makeRuntime((env) => env.call('a'));
      await nextRequest(runtime);
      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()).toBeNull();
    });

    it('runs a script with no operations to completion', async () => {
      const runtime = makeRuntime(() => 42);
      expect(await runtime.step()).toBeNull();
      expect(runtime.hasWork()).toBe(false);
      expect(runtime.completion()).toEqual({ status: 'completed', value: 42, stdout: '', stderr: '' });
    });

    it('maps tool identifiers to method names', async () => {
      const runtime = makeRuntime(
        (env) => env.tools.stripe_charges_create?.({ amount: 5 }),
        new Map([['stripe_charges_create', 'stripe/charges/create']])
      );
      const request = await nextRequest(runtime);
      expect(request.kind).toEqual({
        type: 'tool_call',
        method: 'stripe/charges/create',
        args: { amount: 5 },
      });
    });

    it('rejects tool arguments that are not an object without issuing a request', async () => {
      const runtime = makeRuntime(async (env) => {
        const codes: string[] = [];
        for (const args of [null, [1], 'amount=5']) {
          try {
            // Untyped guest code can pass anything here
            await Reflect.apply(env.call, undefined, ['pay', args]);
            codes.push('sent');
          } catch (err) {
            codes.push(err instanceof GuestOperationError ? err.code : 'other');
          }
        }
        return codes;
      });
      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()?.value).toEqual(['INVALID_ARGUMENT', 'INVALID_ARGUMENT', 'INVALID_ARGUMENT']);
    });

    it('rejects arguments that cannot be cloned across the boundary', async () => {
      const runtime = makeRuntime(async (env) => {
        try {
          await env.call('a', { callback: () => 1 });
          return 'sent';
        } catch (err) {
          return err instanceof GuestOperationError ? err.code : 'other';
        }
      });
      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()?.value).toBe('INVALID_ARGUMENT');
    });
  });

  describe('resume()', () => {
    it('unblocks only the task that issued the request', async () => {
      const runtime = makeRuntime(async (env) => {
        const first = env.spawn((e) => e.call('a'));
        const second = env.spawn((e) => e.call('b'));
        return Promise.all([first, second]);
      });

      const a = await nextRequest(runtime);
      const b = await nextRequest(runtime);
      expect([a.taskId, b.taskId]).toEqual([2, 3]);
      expect(await runtime.step()).toBeNull();

      runtime.resume(b.id, success('B'));
      expect(await runtime.step()).toBeNull();
      expect(runtime.tasks().get(3)).toEqual({ status: 'completed', value: 'B' });
      expect(runtime.tasks().get(2)).toEqual({ status: 'suspended', requestId: a.id });

      runtime.resume(a.id, success('A'));
      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()?.value).toEqual(['A', 'B']);
    });

    it('throws for unknown and already-resolved request ids', async () => {
      const runtime = makeRuntime((env) => env.call('a'));
      const request = await nextRequest(runtime);

      expect(() => runtime.resume(99, success(null))).toThrow(UnknownRequestIdError);
      runtime.resume(request.id, success(null));
      expect(() => runtime.resume(request.id, success(null))).toThrow(UnknownRequestIdError);
    });

    it('completes tasks in resume order', async () => {
      const runtime = makeRuntime(async (env) => {
        const order: string[] = [];
        await Promise.all(
          ['x', 'y', 'z'].map((name) =>
            env.spawn(async (e) => {
              await e.call(name);
              order.push(name);
            })
          )
        );
        return order;
      });

      const requests = new Map<string, number>();
      for (let i = 0; i < 3; i++) {
        const request = await nextRequest(runtime);
        if (request.kind.type === 'tool_call') {
          requests.set(request.kind.method, request.id);
        }
      }

      for (const name of ['z', 'x', 'y']) {
        const id = requests.get(name);
        if (id === undefined) throw new Error(`missing request for ${name}`);
        runtime.resume(id, success(null));
        await runtime.step();
      }

      expect(runtime.completion()?.value).toEqual(['z', 'x', 'y']);
    });

    it('delivers failures as GuestOperationError with the payload code', async () => {
      const runtime = makeRuntime(async (env) => {
        try {
          await env.call('transfer');
          return 'granted';
        } catch (err) {
          return err instanceof GuestOperationError ? [err.code, err.details] : 'other';
        }
      });
      const request = await nextRequest(runtime);
      runtime.resume(request.id, failure('QUOTA_EXCEEDED', 'no calls left', { maxCalls: 1 }));
      await runtime.step();
      expect(runtime.completion()?.value).toEqual(['QUOTA_EXCEEDED', { maxCalls: 1 }]);
    });
  });

  describe('task rules', () => {
    it('rejects a second operation from a busy task with TASK_BUSY', async () => {
      const runtime = makeRuntime(async (env) => {
        const first = env.call('a');
        try {
          await env.call('b');
          return 'both issued';
        } catch (err) {
          if (!(err instanceof GuestOperationError)) throw err;
          return [err.code, await first];
        }
      });

      const request = await nextRequest(runtime);
      expect(await runtime.step()).toBeNull();
      runtime.resume(request.id, success(1));
      await runtime.step();
      expect(runtime.completion()?.value).toEqual(['TASK_BUSY', 1]);
    });

    it('records an unawaited failing task without failing the script', async () => {
      const runtime = makeRuntime((env) => {
        void env.spawn(() => {
          throw new Error('lost');
        });
        return 'done';
      });

      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()?.value).toBe('done');
      expect(runtime.tasks().get(2)).toEqual({
        status: 'failed',
        error: { code: 'GUEST_ERROR', message: 'lost', details: { name: 'Error' } },
      });
    });

    it('reports a thrown script error as a failed completion', async () => {
      const runtime = makeRuntime(() => {
        throw new TypeError('bad input');
      });
      await runtime.step();
      expect(runtime.completion()).toEqual({
        status: 'failed',
        error: { code: 'GUEST_ERROR', message: 'bad input', details: { name: 'TypeError' } },
        stdout: '',
        stderr: '',
      });
    });
  });

  describe('cancel()', () => {
    it('discards pending tasks without delivering results', async () => {
      const runtime = makeRuntime((env) => env.call('a'));
      const request = await nextRequest(runtime);

      runtime.cancel({ code: 'EXECUTION_CANCELLED', message: 'stopped' });

      expect(runtime.hasWork()).toBe(false);
      expect(await runtime.step()).toBeNull();
      expect(() => runtime.resume(request.id, success(1))).toThrow(UnknownRequestIdError);
      expect(runtime.tasks().get(1)).toEqual({
        status: 'failed',
        error: { code: 'EXECUTION_CANCELLED', message: 'stopped' },
      });
      expect(runtime.completion()).toEqual({
        status: 'cancelled',
        error: { code: 'EXECUTION_CANCELLED', message: 'stopped' },
        stdout: '',
        stderr: '',
      });
    });
  });

  describe('guest environment', () => {
    it('captures console output', async () => {
      const runtime = makeRuntime((env) => {
        env.console.log('hello', 42);
        env.console.info('ready');
        env.console.error('bad');
        return 'ok';
      });
      await runtime.step();
      expect(runtime.completion()).toEqual({
        status: 'completed',
        value: 'ok',
        stdout: 'hello 42\nready\n',
        stderr: 'bad\n',
      });
    });

    it('encodes text writes and decodes reads', async () => {
      const runtime = makeRuntime(async (env) => {
        await env.fs.writeFile('/workspace/a.txt', 'hi');
        return env.fs.readText('/workspace/a.txt');
      });

      const write = await nextRequest(runtime);
      expect(write.kind).toEqual({
        type: 'vfs_write',
        path: '/workspace/a.txt',
        data: new TextEncoder().encode('hi'),
      });
      runtime.resume(write.id, success(null));

      const read = await nextRequest(runtime);
      expect(read.kind).toEqual({ type: 'vfs_read', path: '/workspace/a.txt' });
      runtime.resume(read.id, success(new TextEncoder().encode('hi')));
      await runtime.step();

      expect(runtime.completion()?.value).toBe('hi');
    });

    it('fails the read when the host answers with the wrong shape', async () => {
      const runtime = makeRuntime((env) => env.fs.readFile('/workspace/a.txt'));
      const read = await nextRequest(runtime);
      runtime.resume(read.id, success('not bytes'));
      await runtime.step();
      expect(runtime.completion()?.error?.code).toBe('INVALID_RESPONSE');
    });

    it('rejects negative sleeps without issuing a request', async () => {
      const runtime = makeRuntime(async (env) => {
        try {
          await env.sleep(-5);
          return 'slept';
        } catch (err) {
          return err instanceof GuestOperationError ? err.code : 'other';
        }
      });
      expect(await runtime.step()).toBeNull();
      expect(runtime.completion()?.value).toBe('INVALID_ARGUMENT');
    });
  });
});
