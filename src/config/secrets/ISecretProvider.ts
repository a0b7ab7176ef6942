/**
 * Secret provider contract
 *
 * A provider resolves a logical secret name (e.g. "JWT_SECRET_KEY") from one
 * source. Returning undefined means "not here" and lets the resolver try the
 * next provider in the chain; only unexpected failures throw.
 */
export interface ISecretProvider {
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
