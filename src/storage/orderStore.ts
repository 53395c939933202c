/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ORDER STORE — DURABLE RECORD OF IN-FLIGHT EXCHANGE ORDERS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One record per exchange order id. Records are created at placement and
 * pruned as soon as they are marked filled or cancelled, so the file only
 * ever holds orders that may still be working on the exchange. After a
 * crash, active entry records are the orphans startup has to reconcile.
 *
 * Document: { version, savedAt, orders: [OrderRecord] }
 * Every mutation rewrites the document atomically.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BOT_CONFIG } from '../config/constants';
import { OrderRecord, OrderRecordStatus, OrderRole } from '../types';
import { Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';
import { readJsonFile, writeJsonAtomic } from './atomicFile';
import { describeIssues, orderDocumentSchema, orderRecordSchema } from './schemas';
import { PersistenceError } from '../exchange/errors';

export type NewOrderRecord = Omit<OrderRecord, 'status' | 'createdAt' | 'lastUpdated'>;

export interface OrderStoreStatistics {
    total: number;
    active: number;
    byRole: Record<OrderRole, number>;
    byPair: Record<string, number>;
    oldestCreatedAt: Date | null;
}

export class OrderStore {
    private readonly orders = new Map<string, OrderRecord>();

    constructor(
        private readonly file: string,
        private readonly persistenceEnabled: boolean = true,
        private readonly clock: Clock = systemClock
    ) {}

    /**
     * Replace the in-memory view with the file's contents. Corrupt records are
     * skipped with a warning. Resolves with the number of records loaded.
     *
     * @throws PersistenceError when the document itself is unreadable
     */
    async load(): Promise<number> {
        this.orders.clear();
        if (!this.persistenceEnabled) return 0;

        const raw = await readJsonFile(this.file);
        if (raw === null) {
            logger.info(`[ORDER-STORE] No order file at ${this.file}, starting empty`);
            return 0;
        }

        const document = orderDocumentSchema.safeParse(raw);
        if (!document.success) {
            throw new PersistenceError(
                `Invalid order document in ${this.file}: ${describeIssues(document.error)}`,
                this.file
            );
        }

        for (const entry of document.data.orders) {
            const parsed = orderRecordSchema.safeParse(entry);
            if (!parsed.success) {
                logger.warn(`[ORDER-STORE] Skipping corrupt order record: ${describeIssues(parsed.error)}`);
                continue;
            }
            this.orders.set(parsed.data.id, parsed.data);
        }

        logger.info(`[ORDER-STORE] Loaded ${this.orders.size} order record(s) from ${this.file}`);
        return this.orders.size;
    }

    async add(order: NewOrderRecord): Promise<OrderRecord> {
        const now = new Date(this.clock.now());
        const record: OrderRecord = { ...order, status: 'active', createdAt: now, lastUpdated: now };
        this.orders.set(record.id, record);
        await this.persist();
        return record;
    }

    /**
     * Terminal statuses (filled, cancelled) prune the record.
     * Resolves false when the id is unknown.
     */
    async updateStatus(id: string, status: OrderRecordStatus): Promise<boolean> {
        const record = this.orders.get(id);
        if (!record) return false;

        if (status === 'active') {
            this.orders.set(id, { ...record, status, lastUpdated: new Date(this.clock.now()) });
        } else {
            this.orders.delete(id);
            logger.debug(`[ORDER-STORE] ${record.role} order ${id} ${status}, pruned`);
        }

        await this.persist();
        return true;
    }

    async remove(id: string): Promise<boolean> {
        if (!this.orders.delete(id)) return false;
        await this.persist();
        return true;
    }

    get(id: string): OrderRecord | undefined {
        return this.orders.get(id);
    }

    getActive(): OrderRecord[] {
        return [...this.orders.values()].filter(order => order.status === 'active');
    }

    getByPair(pair: string): OrderRecord[] {
        return [...this.orders.values()].filter(order => order.pair === pair);
    }

    /**
     * Drop records created more than `maxAgeHours` ago.
     */
    async cleanupOld(maxAgeHours: number = BOT_CONFIG.STALE_ORDER_MAX_AGE_HOURS): Promise<number> {
        const cutoff = this.clock.now() - maxAgeHours * 60 * 60 * 1000;
        let removed = 0;
        for (const [id, order] of this.orders) {
            if (order.createdAt.getTime() < cutoff) {
                this.orders.delete(id);
                removed++;
            }
        }
        if (removed > 0) {
            logger.info(`[ORDER-STORE] Cleaned up ${removed} order record(s) older than ${maxAgeHours}h`);
            await this.persist();
        }
        return removed;
    }

    getStatistics(): OrderStoreStatistics {
        const byRole: Record<OrderRole, number> = { entry: 0, take_profit: 0, stop_loss: 0 };
        const byPair: Record<string, number> = {};
        let active = 0;
        let oldestCreatedAt: Date | null = null;

        for (const order of this.orders.values()) {
            byRole[order.role]++;
            byPair[order.pair] = (byPair[order.pair] ?? 0) + 1;
            if (order.status === 'active') active++;
            if (oldestCreatedAt === null || order.createdAt < oldestCreatedAt) {
                oldestCreatedAt = order.createdAt;
            }
        }

        return { total: this.orders.size, active, byRole, byPair, oldestCreatedAt };
    }

    async clear(): Promise<void> {
        this.orders.clear();
        await this.persist();
    }

    async flush(): Promise<void> {
        await this.persist();
    }

    private async persist(): Promise<void> {
        if (!this.persistenceEnabled) return;
        await writeJsonAtomic(this.file, {
            version: BOT_CONFIG.STORE_DOCUMENT_VERSION,
            savedAt: new Date(this.clock.now()).toISOString(),
            orders: [...this.orders.values()].map(order => ({
                id: order.id,
                pair: order.pair,
                side: order.side,
                quantity: order.quantity.toFixed(),
                price: order.price.toFixed(),
                role: order.role,
                status: order.status,
                createdAt: order.createdAt.toISOString(),
                lastUpdated: order.lastUpdated.toISOString(),
            })),
        });
    }
}
