// libregroup/src/arena.ts
// Group arena: groups keyed by name, members stored as names only.
//
// Emission position follows the list-ordering convention:
//   before  = 500
//   default = 1000
//   after   = 1500
// Lower order = earlier in the document; equal orders keep insertion order.

import { EmitError } from './errors.js';
import type { Group } from './types.js';

/** Default order for groups added without an explicit position. */
export const DEFAULT_ORDER = 1000;

/** Order for groups placed near the front. */
export const BEFORE_ORDER = 500;

/** Order for groups placed near the end. */
export const AFTER_ORDER = 1500;

/** Outbounds every client understands without a declaration. */
export const BUILTIN_OUTBOUNDS: readonly string[] = ['DIRECT', 'REJECT'];

interface Slot {
    group: Group;
    order: number;
    seq: number;
}

export class GroupArena {
    private readonly slots = new Map<string, Slot>();

    /**
     * Add a group at an order position.
     *
     * @param group - Group to register; its name must be unused
     * @param order - Sort position (lower = earlier)
     */
    add(group: Group, order: number = DEFAULT_ORDER): this {
        if (this.slots.has(group.name)) {
            throw new EmitError(`Group ${group.name} is declared twice`);
        }
        this.slots.set(group.name, { group, order, seq: this.slots.size });
        return this;
    }

    get(name: string): Group | undefined {
        return this.slots.get(name)?.group;
    }

    has(name: string): boolean {
        return this.slots.has(name);
    }

    /** Groups in build (insertion) order. */
    built(): Group[] {
        return [...this.slots.values()].map(slot => slot.group);
    }

    /** Groups in emission order: by order, then insertion. */
    ordered(): Group[] {
        return [...this.slots.values()]
            .sort((a, b) => a.order - b.order || a.seq - b.seq)
            .map(slot => slot.group);
    }

    get size(): number {
        return this.slots.size;
    }
}

/** Member names of a group (empty for include-all load-balance groups). */
export function membersOf(group: Group): readonly string[] {
    return group.proxies ?? [];
}

/**
 * Check that the group graph is self-consistent.
 *
 * Every member must name a declared group, a declared proxy or a builtin
 * outbound; group names must not shadow proxy names; group references must
 * not form a cycle.
 */
export function validateGroups(arena: GroupArena, proxyNames: readonly string[]): void {
    const proxies = new Set(proxyNames);

    for (const group of arena.built()) {
        if (proxies.has(group.name)) {
            throw new EmitError(`Group ${group.name} has the same name as a proxy`);
        }
        for (const member of membersOf(group)) {
            if (!arena.has(member) && !proxies.has(member) && !BUILTIN_OUTBOUNDS.includes(member)) {
                throw new EmitError(`Group ${group.name} references undeclared member ${member}`);
            }
        }
    }

    const visiting = new Set<string>();
    const done = new Set<string>();
    const visit = (name: string, path: string[]): void => {
        if (done.has(name)) return;
        if (visiting.has(name)) {
            throw new EmitError(`Group cycle: ${[...path, name].join(' -> ')}`);
        }
        visiting.add(name);
        const group = arena.get(name);
        if (group) {
            for (const member of membersOf(group)) {
                if (arena.has(member)) visit(member, [...path, name]);
            }
        }
        visiting.delete(name);
        done.add(name);
    };
    for (const group of arena.built()) visit(group.name, []);
}
