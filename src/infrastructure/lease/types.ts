export interface CycleLease {
  release(): Promise<void>;
}

/**
 * Serializes poll cycles. `tryAcquire` resolves to undefined while another
 * holder owns the lease named `name`.
 */
export interface CycleLeaseManager {
  tryAcquire(name: string, ttlSeconds: number): Promise<CycleLease | undefined>;
}
