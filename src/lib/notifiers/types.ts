/**
 * Receives "slot freed" events from the sync engine.
 */
export interface SlotNotifier {
  notifySlotFreed(date: string, passNo: number, humanTime: string): Promise<void>;
}
