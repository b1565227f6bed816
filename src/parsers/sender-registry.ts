import type { Sender } from '../types';
import { RegistryError } from '../utils/errors';

// ============================================================================
// SENDER REGISTRY
// ============================================================================

/**
 * Assigns dense ids to display names in first-seen order.
 * One registry is shared by every transcript of a run, so the same name in
 * two chats resolves to the same sender.
 */
export class SenderRegistry {
    private readonly byId: Sender[] = [];
    private readonly byName = new Map<string, Sender>();

    /**
     * Returns the id for a display name, allocating the next one if the name is new
     */
    resolve(displayName: string): number {
        const existing = this.byName.get(displayName);
        if (existing) {
            return existing.id;
        }

        const sender: Sender = { id: this.byId.length, displayName };
        this.byId.push(sender);
        this.byName.set(displayName, sender);
        return sender.id;
    }

    get(id: number): Sender | undefined {
        return Number.isInteger(id) && id >= 0 && id < this.byId.length ? this.byId[id] : undefined;
    }

    nameOf(id: number): string {
        const sender = this.get(id);
        if (!sender) {
            throw new RegistryError(id);
        }
        return sender.displayName;
    }

    get size(): number {
        return this.byId.length;
    }

    /**
     * All senders in id order
     */
    senders(): Sender[] {
        return [...this.byId];
    }
}
