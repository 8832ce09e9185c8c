import { applyDefinitionSubstitutions } from '../../src/utils/definition-substitutions';
import { deriveStateMachineName } from '../../src/utils/derive-state-machine-name';

describe('deriveStateMachineName', () => {
  it.each([
    ['OrderFulfillmentStateMachine', 'order-fulfillment-state-machine'],
    ['HTTPRetryFlow', 'http-retry-flow'],
    ['Checkout', 'checkout'],
    ['Step2Flow', 'step2-flow'],
  ])('should derive %s as %s', (className, expected) => {
    expect(deriveStateMachineName(className)).toBe(expected);
  });
});

describe('applyDefinitionSubstitutions', () => {
  it('should return the definition untouched without substitutions', () => {
    const definition = { StartAt: '${Start}' };
    expect(applyDefinitionSubstitutions(definition)).toBe(definition);
  });

  it('should replace known placeholders and keep unknown ones', () => {
    const result = applyDefinitionSubstitutions(
      { StartAt: 'Work', Resource: '${ChargeFn}', Other: '${Unknown}' },
      { ChargeFn: 'charge-card' },
    );

    expect(JSON.parse(String(result))).toEqual({
      StartAt: 'Work',
      Resource: 'charge-card',
      Other: '${Unknown}',
    });
  });

  it('should escape values for JSON strings', () => {
    const result = applyDefinitionSubstitutions('{"Comment": "${Note}"}', {
      Note: 'say "hi"',
    });

    expect(JSON.parse(String(result))).toEqual({ Comment: 'say "hi"' });
  });
});
