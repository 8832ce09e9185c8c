/**
 * `OrderFulfillmentStateMachine` → `order-fulfillment-state-machine`.
 * Runs of capitals stay together: `HTTPRetryFlow` → `http-retry-flow`.
 */
export function deriveStateMachineName(className: string): string {
  return className
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .toLowerCase();
}
