import { StatesRuntimeError } from '../../src/errors/states-runtime.error';
import {
  collectTemplatePaths,
  resolveTemplate,
} from '../../src/utils/payload-template';

describe('payload-template', () => {
  const context = {
    Execution: { Id: 'exec-1' },
    Map: { Item: { Index: 3, Value: 'item' } },
  };

  it('should resolve path references and copy static fields', () => {
    const template = {
      'orderId.$': '$.order.id',
      source: 'api',
      nested: { 'total.$': '$.order.total', fixed: [1, 2] },
    };
    const input = { order: { id: 'o-1', total: 99 } };

    expect(resolveTemplate(template, input, context)).toEqual({
      orderId: 'o-1',
      source: 'api',
      nested: { total: 99, fixed: [1, 2] },
    });
  });

  it('should resolve context references', () => {
    const template = { 'id.$': '$$.Execution.Id', 'index.$': '$$.Map.Item.Index' };

    expect(resolveTemplate(template, {}, context)).toEqual({
      id: 'exec-1',
      index: 3,
    });
  });

  it('should resolve templates inside arrays', () => {
    expect(resolveTemplate([{ 'v.$': '$.x' }, 'plain'], { x: 5 }, context)).toEqual([
      { v: 5 },
      'plain',
    ]);
  });

  it('should fail with States.ParameterPathFailure for a missing path', () => {
    const resolve = () => resolveTemplate({ 'v.$': '$.missing' }, { x: 1 }, context);

    expect(resolve).toThrow(StatesRuntimeError);
    try {
      resolve();
    } catch (error) {
      expect(error).toBeInstanceOf(StatesRuntimeError);
      expect((error as StatesRuntimeError).error).toBe('States.ParameterPathFailure');
    }
  });

  it('should collect every path reference', () => {
    expect(
      collectTemplatePaths({
        'a.$': '$.a',
        b: { 'c.$': '$$.Execution.Id' },
        list: [{ 'd.$': '$.d' }],
        e: 'literal',
      }),
    ).toEqual(['$.a', '$$.Execution.Id', '$.d']);
  });
});
