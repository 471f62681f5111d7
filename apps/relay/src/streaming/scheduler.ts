/**
 * Picks which stream publishes next when bandwidth is constrained.
 *
 * Lower priority values are served first; streams sharing a priority are
 * served round-robin so none of them starves.
 */
export class PriorityScheduler {
    private levels: Map<number, string[]> = new Map();
    private priorities: Map<string, number> = new Map();
    /** Index of the last stream served, per priority level */
    private cursors: Map<number, number> = new Map();

    register(streamId: string, priority: number): void {
        if (this.priorities.has(streamId)) {
            this.unregister(streamId);
        }
        this.priorities.set(streamId, priority);
        const level = this.levels.get(priority) ?? [];
        level.push(streamId);
        this.levels.set(priority, level);
    }

    unregister(streamId: string): void {
        const priority = this.priorities.get(streamId);
        if (priority === undefined) return;
        this.priorities.delete(streamId);

        const level = this.levels.get(priority) ?? [];
        const index = level.indexOf(streamId);
        level.splice(index, 1);
        if (level.length === 0) {
            this.levels.delete(priority);
            this.cursors.delete(priority);
            return;
        }

        const cursor = this.cursors.get(priority);
        if (cursor !== undefined && index <= cursor) {
            this.cursors.set(priority, cursor - 1);
        }
    }

    /**
     * Next stream to serve among those for which `isReady` holds, or
     * undefined if none is ready.
     */
    next(isReady: (streamId: string) => boolean): string | undefined {
        const ordered = [...this.levels.keys()].sort((a, b) => a - b);
        for (const priority of ordered) {
            const level = this.levels.get(priority) ?? [];
            const start = (this.cursors.get(priority) ?? -1) + 1;
            for (let offset = 0; offset < level.length; offset++) {
                const index = (start + offset) % level.length;
                const streamId = level[index];
                if (streamId !== undefined && isReady(streamId)) {
                    this.cursors.set(priority, index);
                    return streamId;
                }
            }
        }
        return undefined;
    }
}
