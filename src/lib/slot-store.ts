import { and, asc, eq, gte, lte, sql } from "drizzle-orm";
import type { AppDatabase } from "./db";
import { silentLogger, type Logger } from "./logger";
import { slots, type SlotRow } from "./schema";
import { isSlotStatus, type Slot, type SlotStatus } from "./types";

/**
 * Key-value table of slot status, unique on (date, passNo).
 */
export interface SlotStore {
  findAll(): Promise<Slot[]>;
  findByKey(date: string, passNo: number): Promise<Slot | null>;
  findBetween(startDate: string, endDate: string): Promise<Slot[]>;
  save(slot: Slot): Promise<void>;
  saveAll(slots: Slot[]): Promise<void>;
  updateStatus(date: string, passNo: number, status: SlotStatus): Promise<boolean>;
}

export class DrizzleSlotStore implements SlotStore {
  private readonly db: AppDatabase;
  private readonly log: Logger;

  constructor(db: AppDatabase, logger: Logger = silentLogger) {
    this.db = db;
    this.log = logger;
  }

  async findAll(): Promise<Slot[]> {
    const rows = await this.db.query.slots.findMany({
      orderBy: [asc(slots.date), asc(slots.passNo)],
    });
    return this.toSlots(rows);
  }

  async findByKey(date: string, passNo: number): Promise<Slot | null> {
    const row = await this.db.query.slots.findFirst({
      where: and(eq(slots.date, date), eq(slots.passNo, passNo)),
    });
    return row ? this.toSlot(row) : null;
  }

  async findBetween(startDate: string, endDate: string): Promise<Slot[]> {
    const rows = await this.db.query.slots.findMany({
      where: and(gte(slots.date, startDate), lte(slots.date, endDate)),
      orderBy: [asc(slots.date), asc(slots.passNo)],
    });
    return this.toSlots(rows);
  }

  async save(slot: Slot): Promise<void> {
    await this.saveAll([slot]);
  }

  async saveAll(batch: Slot[]): Promise<void> {
    if (batch.length === 0) {
      this.log.warn("No slots to save to database");
      return;
    }

    for (const slot of batch) {
      if (!isSlotStatus(slot.status)) {
        throw new Error(`Refusing to store slot ${slot.date}:${slot.passNo} with status ${String(slot.status)}`);
      }
    }

    this.db.transaction((tx) => {
      for (const slot of batch) {
        tx.insert(slots)
          .values({ date: slot.date, passNo: slot.passNo, status: slot.status })
          .onConflictDoUpdate({
            target: [slots.date, slots.passNo],
            set: { status: slot.status, updatedAt: sql`CURRENT_TIMESTAMP` },
          })
          .run();
      }
    });
    this.log.debug({ count: batch.length }, "Saved slots");
  }

  async updateStatus(date: string, passNo: number, status: SlotStatus): Promise<boolean> {
    const updated = this.db
      .update(slots)
      .set({ status, updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(and(eq(slots.date, date), eq(slots.passNo, passNo)))
      .returning({ id: slots.id })
      .all();

    if (updated.length === 0) {
      this.log.warn({ date, passNo }, "No slot found to update");
      return false;
    }
    return true;
  }

  private toSlots(rows: SlotRow[]): Slot[] {
    return rows.map((row) => this.toSlot(row)).filter((slot): slot is Slot => slot !== null);
  }

  private toSlot(row: SlotRow): Slot | null {
    if (!isSlotStatus(row.status)) {
      this.log.warn({ date: row.date, passNo: row.passNo, status: row.status }, "Discarding slot with invalid status");
      return null;
    }
    return { date: row.date, passNo: row.passNo, status: row.status };
  }
}
