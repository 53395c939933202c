/**
 * Position Store: one JSON object mapping positionId → position.
 *
 * Decimals are written with toFixed() (plain notation, full precision) so a
 * save/load round trip reproduces every field exactly.
 */

import { PersistenceError } from '../exchange/errors';
import { Position } from '../types';
import logger from '../utils/logger';
import { readJsonFile, writeJsonAtomic } from './atomicFile';
import { describeIssues, positionDocumentSchema, positionSchema } from './schemas';

interface SerializedPosition {
    id: string;
    pair: string;
    quantity: string;
    entryPrice: string;
    stopLossPrice: string;
    takeProfitPrice: string;
    createdAt: string;
    entryFilledAt: string;
    status: string;
    entryOrderId: string;
    takeProfitOrderId?: string;
    stopLossOrderId?: string;
}

export function serializePosition(position: Position): SerializedPosition {
    const serialized: SerializedPosition = {
        id: position.id,
        pair: position.pair,
        quantity: position.quantity.toFixed(),
        entryPrice: position.entryPrice.toFixed(),
        stopLossPrice: position.stopLossPrice.toFixed(),
        takeProfitPrice: position.takeProfitPrice.toFixed(),
        createdAt: position.createdAt.toISOString(),
        entryFilledAt: position.entryFilledAt.toISOString(),
        status: position.status,
        entryOrderId: position.entryOrderId,
    };
    if (position.takeProfitOrderId !== undefined) serialized.takeProfitOrderId = position.takeProfitOrderId;
    if (position.stopLossOrderId !== undefined) serialized.stopLossOrderId = position.stopLossOrderId;
    return serialized;
}

export class PositionStore {
    private positions = new Map<string, Position>();

    constructor(private readonly file: string) {}

    /**
     * Load every valid position. A missing file is an empty store; corrupt
     * entries are skipped with a warning.
     *
     * @throws PersistenceError when the document itself is unreadable
     */
    async load(): Promise<Map<string, Position>> {
        const raw = await readJsonFile(this.file);
        this.positions = new Map();

        if (raw === null) {
            return new Map();
        }

        const document = positionDocumentSchema.safeParse(raw);
        if (!document.success) {
            throw new PersistenceError(
                `Invalid position document in ${this.file}: ${describeIssues(document.error)}`,
                this.file
            );
        }

        for (const [key, entry] of Object.entries(document.data)) {
            const parsed = positionSchema.safeParse(entry);
            if (!parsed.success) {
                logger.warn(`[POSITION-STORE] Skipping corrupt position ${key}: ${describeIssues(parsed.error)}`);
                continue;
            }
            this.positions.set(parsed.data.id, parsed.data);
        }

        logger.info(`[POSITION-STORE] Loaded ${this.positions.size} position(s) from ${this.file}`);
        return new Map(this.positions);
    }

    /**
     * Replace the whole document with `positions`.
     */
    async save(positions: Iterable<Position>): Promise<void> {
        const next = new Map<string, Position>();
        for (const position of positions) {
            next.set(position.id, position);
        }
        this.positions = next;
        await this.persist();
    }

    async upsert(position: Position): Promise<void> {
        this.positions.set(position.id, position);
        await this.persist();
    }

    async delete(positionId: string): Promise<boolean> {
        if (!this.positions.delete(positionId)) return false;
        await this.persist();
        return true;
    }

    private async persist(): Promise<void> {
        const positions: Record<string, SerializedPosition> = {};
        for (const [id, position] of this.positions) {
            positions[id] = serializePosition(position);
        }
        await writeJsonAtomic(this.file, positions);
    }
}
