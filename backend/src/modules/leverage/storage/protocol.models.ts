/**
 * Leverage Protocol — MongoDB Models
 */

import mongoose, { Schema, Document, Types } from 'mongoose';
import { LEVERAGE_CONFIG } from '../leverage.config.js';

// ═══════════════════════════════════════════════════════════════
// 1. SNAPSHOT MODEL
// ═══════════════════════════════════════════════════════════════

/** One document per ledger, overwritten on every commit */
export interface IProtocolSnapshotDoc extends Document {
  _id: Types.ObjectId;
  key: string;
  block: number;
  /** encoded ProtocolState (bigints as decimal strings) */
  state: unknown;
  createdAt: Date;
  updatedAt: Date;
}

const ProtocolSnapshotSchema = new Schema<IProtocolSnapshotDoc>(
  {
    key: { type: String, required: true, unique: true },
    block: { type: Number, required: true },
    state: { type: Schema.Types.Mixed, required: true },
  },
  {
    timestamps: true,
    collection: LEVERAGE_CONFIG.collections.snapshots,
    minimize: false,
  },
);

export const ProtocolSnapshotModel = mongoose.model<IProtocolSnapshotDoc>('LeverageProtocolSnapshot', ProtocolSnapshotSchema);

// ═══════════════════════════════════════════════════════════════
// 2. EVENT MODEL
// ═══════════════════════════════════════════════════════════════

export interface IProtocolEventDoc extends Document {
  _id: Types.ObjectId;
  eventId: string;
  type: string;
  block: number;
  data: unknown;
  createdAt: Date;
}

const ProtocolEventSchema = new Schema<IProtocolEventDoc>(
  {
    eventId: { type: String, required: true, unique: true },
    type: { type: String, required: true, index: true },
    block: { type: Number, required: true },
    data: { type: Schema.Types.Mixed, default: {} },
  },
  {
    timestamps: { createdAt: 'createdAt', updatedAt: false },
    collection: LEVERAGE_CONFIG.collections.events,
    minimize: false,
  },
);

ProtocolEventSchema.index({ block: -1 });

export const ProtocolEventModel = mongoose.model<IProtocolEventDoc>('LeverageProtocolEvent', ProtocolEventSchema);
