const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Replaces `${Key}` placeholders in a definition document with the given
 * values. Unknown keys are left in place. Values are escaped so they land
 * inside JSON strings intact.
 */
export function applyDefinitionSubstitutions(
  definition: unknown,
  substitutions: Record<string, string> = {},
): unknown {
  if (Object.keys(substitutions).length === 0) {
    return definition;
  }

  const text = typeof definition === 'string' ? definition : JSON.stringify(definition);
  return text.replace(PLACEHOLDER_PATTERN, (placeholder, key: string) =>
    Object.hasOwn(substitutions, key)
      ? JSON.stringify(substitutions[key]).slice(1, -1)
      : placeholder,
  );
}
