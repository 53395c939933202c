/**
 * ID Generation Utilities
 *
 * Position ids are generated fresh per position: a UUID v4 joined to a
 * nanosecond timestamp. Never derived from the pair or reused.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a collision-resistant id for a new position.
 *
 * @example
 * ```typescript
 * const positionId = generatePositionId();
 * // "550e8400-e29b-41d4-a716-446655440000-1234567890123456789"
 * ```
 */
export function generatePositionId(): string {
    return `${uuidv4()}-${process.hrtime.bigint().toString()}`;
}

/**
 * Id for a position rebuilt from exchange state after a restart.
 */
export function generateRecoveredPositionId(pair: string): string {
    return `${pair}-recovered-${uuidv4()}`;
}
