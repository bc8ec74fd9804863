import { sqliteTable, text, integer, unique } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const slots = sqliteTable(
  "slots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    date: text("date").notNull(), // YYYY-MM-DD
    passNo: integer("pass_no").notNull(),
    status: text("status").notNull(), // 'free', 'own', 'busy'
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => ({
    uniqueSlot: unique().on(table.date, table.passNo),
  })
);

export type SlotRow = typeof slots.$inferSelect;
