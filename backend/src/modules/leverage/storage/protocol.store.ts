/**
 * PROTOCOL STORE
 *
 * Persists committed snapshots and events. MongoDB when connected,
 * in-memory otherwise (and in tests). The in-memory ledger stays the
 * source of truth; the store only makes restarts resumable.
 */

import type { Logger } from '../../../common/logger.js';
import { toPlain, decodeState, encodeState, type Plain } from '../state/protocol.codec.js';
import type { ProtocolEvent } from '../protocol.events.js';
import type { ProtocolState } from '../state/protocol.state.js';
import type { BlockHeight } from '../leverage.types.js';
import { ProtocolEventModel, ProtocolSnapshotModel } from './protocol.models.js';

export interface ProtocolStore {
  readonly kind: 'mongo' | 'memory';
  loadLatest(): Promise<ProtocolState | null>;
  saveSnapshot(state: ProtocolState, block: BlockHeight): Promise<void>;
  appendEvents(events: ProtocolEvent[]): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryProtocolStore implements ProtocolStore {
  readonly kind = 'memory' as const;
  private latest: { block: BlockHeight; state: Plain } | null = null;
  readonly events: Array<{ eventId: string; type: string; block: BlockHeight; data: Plain }> = [];

  async loadLatest(): Promise<ProtocolState | null> {
    return this.latest ? decodeState(this.latest.state) : null;
  }

  async saveSnapshot(state: ProtocolState, block: BlockHeight): Promise<void> {
    this.latest = { block, state: encodeState(state) };
  }

  async appendEvents(events: ProtocolEvent[]): Promise<void> {
    for (const event of events) {
      this.events.push({ eventId: event.id, type: event.type, block: event.block, data: toPlain(event.data) });
    }
  }

  get snapshotBlock(): BlockHeight | null {
    return this.latest?.block ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGODB
// ═══════════════════════════════════════════════════════════════

export const LATEST_SNAPSHOT_KEY = 'latest';

export class MongoProtocolStore implements ProtocolStore {
  readonly kind = 'mongo' as const;

  constructor(private readonly logger: Logger) {}

  async loadLatest(): Promise<ProtocolState | null> {
    const doc = await ProtocolSnapshotModel.findOne({ key: LATEST_SNAPSHOT_KEY }).lean();
    if (!doc) return null;
    this.logger.info({ block: doc.block }, 'Restoring protocol snapshot');
    return decodeState(doc.state);
  }

  async saveSnapshot(state: ProtocolState, block: BlockHeight): Promise<void> {
    await ProtocolSnapshotModel.updateOne(
      { key: LATEST_SNAPSHOT_KEY },
      { $set: { block, state: encodeState(state) } },
      { upsert: true },
    );
  }

  async appendEvents(events: ProtocolEvent[]): Promise<void> {
    if (events.length === 0) return;
    await ProtocolEventModel.insertMany(
      events.map((event) => ({
        eventId: event.id,
        type: event.type,
        block: event.block,
        data: toPlain(event.data),
      })),
    );
  }
}
