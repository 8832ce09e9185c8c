import { TaskError } from '../../src/errors/task.error';
import type { InvocationContext } from '../../src/interfaces/resource-invoker.interface';
import {
  extractFunctionName,
  LocalResourceInvoker,
} from '../../src/invokers/local-resource.invoker';

const context: InvocationContext = {
  executionId: 'exec-1',
  stateName: 'Work',
  attempt: 1,
  signal: new AbortController().signal,
};

describe('extractFunctionName', () => {
  it.each([
    ['arn:aws:lambda:us-east-1:000000000000:function:charge-card', 'charge-card'],
    ['arn:aws:lambda:us-east-1:000000000000:function:charge-card:live', 'charge-card'],
    ['functions/function/charge-card', 'charge-card'],
    ['local:charge-card', 'charge-card'],
    ['charge-card', 'charge-card'],
  ])('should read %s as %s', (resource, expected) => {
    expect(extractFunctionName(resource)).toBe(expected);
  });
});

describe('LocalResourceInvoker', () => {
  it('should call the handler registered under the exact resource', async () => {
    const handler = jest.fn().mockResolvedValue({ charged: true });
    const invoker = new LocalResourceInvoker({ 'charge-card': handler });

    await expect(invoker.invoke('charge-card', { amount: 5 }, context)).resolves.toEqual({
      charged: true,
    });
    expect(handler).toHaveBeenCalledWith({ amount: 5 }, context);
  });

  it('should resolve a function ARN to its function name', async () => {
    const invoker = new LocalResourceInvoker({ 'charge-card': () => 'ok' });

    await expect(
      invoker.invoke('arn:aws:lambda:us-east-1:000000000000:function:charge-card', {}, context),
    ).resolves.toBe('ok');
    expect(invoker.has('arn:aws:lambda:us-east-1:000000000000:function:charge-card')).toBe(
      true,
    );
  });

  it('should unwrap lambda:invoke payloads and wrap the result', async () => {
    const handler = jest.fn().mockResolvedValue({ total: 12 });
    const invoker = new LocalResourceInvoker({ pricing: handler });

    const result = await invoker.invoke(
      'arn:aws:states:::lambda:invoke',
      { FunctionName: 'pricing', Payload: { sku: 'A-1' } },
      context,
    );

    expect(handler).toHaveBeenCalledWith({ sku: 'A-1' }, context);
    expect(result).toEqual({ Payload: { total: 12 }, StatusCode: 200 });
  });

  it('should require a FunctionName for lambda:invoke', async () => {
    const invoker = new LocalResourceInvoker();

    await expect(
      invoker.invoke('arn:aws:states:::lambda:invoke', { Payload: {} }, context),
    ).rejects.toThrow('requires a FunctionName parameter');
  });

  it('should fail with States.TaskFailed for an unknown resource', async () => {
    const invoker = new LocalResourceInvoker();

    const error = await invoker.invoke('missing', {}, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TaskError);
    expect(error).toMatchObject({
      error: 'States.TaskFailed',
      cause: 'No task handler registered for resource "missing"',
    });
  });

  it('should replace a handler registered twice', async () => {
    const invoker = new LocalResourceInvoker({ work: () => 'first' });
    invoker.register('work', () => 'second');

    await expect(invoker.invoke('work', null, context)).resolves.toBe('second');
    expect(invoker.registeredNames).toEqual(['work']);
  });
});
