import type { ClockSyncProvider, ClockSyncRecord } from "./types.js";

/**
 * In-memory store of the latest clock-sync estimate per stream.
 *
 * The clock-sync collaborator calls `update` on its own schedule; the relay
 * only ever reads through `getLatest`.
 */
export class ClockSyncRegistry implements ClockSyncProvider {
    private records: Map<string, ClockSyncRecord> = new Map();

    update(streamId: string, record: ClockSyncRecord): void {
        this.records.set(streamId, { ...record });
    }

    getLatest(streamId: string): ClockSyncRecord | undefined {
        return this.records.get(streamId);
    }
}
