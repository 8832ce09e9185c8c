export type DefinitionErrorKind =
  | 'invalid-document'
  | 'missing-field'
  | 'unknown-state-type'
  | 'unknown-target'
  | 'missing-transition'
  | 'conflicting-transition'
  | 'invalid-path'
  | 'invalid-choice-rule'
  | 'invalid-value'
  | 'no-terminal-state'
  | 'invalid-nested-definition';

export class DefinitionError extends Error {
  constructor(
    public readonly kind: DefinitionErrorKind,
    message: string,
    public readonly stateName?: string,
    public readonly inner?: DefinitionError,
  ) {
    super(stateName ? `State "${stateName}": ${message}` : message);
    this.name = 'DefinitionError';
  }
}
