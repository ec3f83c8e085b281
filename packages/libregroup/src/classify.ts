// libregroup/src/classify.ts
// Assigns every proxy to exactly one bucket. Pure: the same entries and
// options always yield the same buckets in the same order.

import { ClassifyError } from './errors.js';
import { INFO_BUCKET, isInfoNode } from './info.js';
import { stemMatcher } from './matcher.js';
import { stemOf } from './decompose.js';
import { lookupEntry } from './registry.js';
import type {
    Bucket, BucketKind, BucketMap, ClassifyOptions, Matcher, ProxyEntry,
} from './types.js';

interface BucketDraft {
    name: string;
    kind: BucketKind;
    matcher?: Matcher;
    members: string[];
}

/** Bucket a single name would land in (ignores the info predicate). */
export function bucketOf(name: string, options: ClassifyOptions): string {
    const { strategy } = options;
    switch (strategy.kind) {
        case 'registry':
            return lookupEntry(strategy.registry, name).name;
        case 'decompose':
            return stemOf(name);
    }
}

/**
 * Classify entries into buckets.
 *
 * Region buckets appear in first-seen order. In registry mode the catch-all
 * is always present and always last among region buckets; with
 * `includeEmptyBuckets` the registry buckets never seen follow the seen ones
 * in registry order. The info bucket, when non-empty, comes last.
 */
export function classify(entries: readonly ProxyEntry[], options: ClassifyOptions): BucketMap {
    const { strategy, detectInfoNodes } = options;
    const drafts = new Map<string, BucketDraft>();
    const info: string[] = [];
    const others: string[] = [];

    for (const { name } of entries) {
        if (!name.trim()) {
            throw new ClassifyError('Proxy name is empty; it cannot be placed in any bucket');
        }
        if (detectInfoNodes && isInfoNode(name)) {
            info.push(name);
            continue;
        }

        switch (strategy.kind) {
            case 'registry': {
                const entry = lookupEntry(strategy.registry, name);
                if (entry === strategy.registry.catchAll) {
                    others.push(name);
                } else {
                    draftFor(drafts, entry.name, entry.matcher).members.push(name);
                }
                break;
            }
            case 'decompose': {
                const stem = stemOf(name);
                draftFor(drafts, stem, stemMatcher(stem)).members.push(name);
                break;
            }
        }
    }

    if (strategy.kind === 'registry') {
        const { registry, includeEmptyBuckets } = strategy;
        if (includeEmptyBuckets) {
            for (const entry of registry.entries) {
                if (entry === registry.catchAll) continue;
                draftFor(drafts, entry.name, entry.matcher);
            }
        }
        drafts.set(registry.catchAll.name, {
            name: registry.catchAll.name,
            kind: 'catch-all',
            matcher: registry.catchAll.matcher,
            members: others,
        });
    }

    if (info.length > 0) {
        drafts.set(INFO_BUCKET, { name: INFO_BUCKET, kind: 'info', members: info });
    }

    const buckets = new Map<string, Bucket>();
    for (const [name, draft] of drafts) {
        buckets.set(name, freeze(draft));
    }
    return buckets;
}

/** Flatten a bucket map back to name → bucket name. */
export function assignments(buckets: BucketMap): Map<string, string> {
    const result = new Map<string, string>();
    for (const bucket of buckets.values()) {
        for (const member of bucket.members) result.set(member, bucket.name);
    }
    return result;
}

function draftFor(drafts: Map<string, BucketDraft>, name: string, matcher: Matcher): BucketDraft {
    let draft = drafts.get(name);
    if (!draft) {
        draft = { name, kind: 'region', matcher, members: [] };
        drafts.set(name, draft);
    }
    return draft;
}

function freeze(draft: BucketDraft): Bucket {
    return Object.freeze({ ...draft, members: Object.freeze([...draft.members]) });
}
