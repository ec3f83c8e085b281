// libregroup/src/synthesize.ts
// Builds the group hierarchy from classified buckets.
//
// Build order: node selector, all-nodes load-balance, one load-balance group
// per region bucket, direct connection, default traffic (placed first in the
// document), info nodes (placed last).

import { AFTER_ORDER, BEFORE_ORDER, GroupArena } from './arena.js';
import { EmitError } from './errors.js';
import {
    ALL_NODES, DEFAULT_TRAFFIC, DIRECT_CONNECT, NODE_SELECT, STEM_GROUP_SUFFIX,
    loadBalanceGroup, selectGroup,
} from './groups.js';
import type { FixedGroupNames } from './groups.js';
import { INFO_BUCKET, INFO_PATTERN } from './info.js';
import { clientFilter, unionFilter } from './matcher.js';
import { precedingPatterns } from './registry.js';
import type { Bucket, BucketMap, ClassifyOptions, Group } from './types.js';

/**
 * Fixed group names, each renamed with `uniqueName` when a proxy already
 * uses it. Pure: the same proxy names always resolve the same way.
 */
export function resolveFixedNames(proxyNames: readonly string[]): FixedGroupNames {
    const taken = new Set(proxyNames);
    const claim = (base: string): string => {
        const name = uniqueName(base, taken);
        taken.add(name);
        return name;
    };
    return {
        defaultTraffic: claim(DEFAULT_TRAFFIC),
        nodeSelect: claim(NODE_SELECT),
        allNodes: claim(ALL_NODES),
        directConnect: claim(DIRECT_CONNECT),
        info: claim(INFO_BUCKET),
    };
}

/**
 * Synthesize groups for classified buckets.
 *
 * Group names never shadow proxy names: fixed groups resolve through
 * `resolveFixedNames`, region groups through `uniqueName`.
 *
 * @param buckets    - Output of `classify`
 * @param proxyNames - Every proxy name, in input order
 * @param options    - The options the buckets were classified with
 */
export function synthesizeGroups(
    buckets: BucketMap,
    proxyNames: readonly string[],
    options: ClassifyOptions,
): GroupArena {
    const { strategy } = options;
    const keepEmpty = strategy.kind === 'registry' && strategy.includeEmptyBuckets;

    const info = buckets.get(INFO_BUCKET);
    const infoMembers = info?.kind === 'info' ? info.members : [];
    const infoExclude = infoMembers.length > 0 ? [INFO_PATTERN] : [];

    const names = resolveFixedNames(proxyNames);
    const taken = new Set([...proxyNames, ...Object.values(names)]);
    const arena = new GroupArena();

    arena.add(selectGroup(names.nodeSelect, proxyNames));
    arena.add(loadBalanceGroup(names.allNodes, {
        includeAll: true,
        excludeFilter: unionFilter(infoExclude),
    }));

    const regionGroups: string[] = [];
    for (const bucket of buckets.values()) {
        if (bucket.kind === 'info') continue;
        if (bucket.members.length === 0 && !keepEmpty) continue;

        const group = regionGroup(bucket, options, infoExclude, taken);
        taken.add(group.name);
        arena.add(group);
        regionGroups.push(group.name);
    }

    arena.add(selectGroup(names.directConnect, ['DIRECT']));
    arena.add(
        selectGroup(names.defaultTraffic, [
            names.nodeSelect, names.directConnect, names.allNodes, ...regionGroups,
        ]),
        BEFORE_ORDER,
    );

    if (infoMembers.length > 0) {
        arena.add(selectGroup(names.info, infoMembers), AFTER_ORDER);
    }

    return arena;
}

function regionGroup(
    bucket: Bucket,
    { strategy }: ClassifyOptions,
    infoExclude: readonly string[],
    taken: ReadonlySet<string>,
): Group {
    const matcher = bucket.matcher;
    if (!matcher) {
        throw new EmitError(`Bucket ${bucket.name} has no matcher`);
    }

    switch (matcher.kind) {
        case 'regex': {
            if (strategy.kind !== 'registry') {
                throw new EmitError(`Pattern bucket ${bucket.name} outside registry mode`);
            }
            // Earlier patterns are excluded so the client sees the same
            // first-match-wins partition as the classifier.
            const earlier = precedingPatterns(strategy.registry, bucket.name);
            return loadBalanceGroup(uniqueName(bucket.name, taken), {
                includeAll: true,
                filter: clientFilter(matcher.source),
                excludeFilter: unionFilter([...earlier, ...infoExclude]),
            });
        }
        case 'stem':
            return loadBalanceGroup(uniqueName(`${matcher.stem}${STEM_GROUP_SUFFIX}`, taken), {
                proxies: bucket.members,
            });
    }
}

/** `base`, or `base #2`, `base #3`… whichever is free first. */
export function uniqueName(base: string, taken: ReadonlySet<string>): string {
    if (!taken.has(base)) return base;
    for (let i = 2; ; i++) {
        const candidate = `${base} #${i}`;
        if (!taken.has(candidate)) return candidate;
    }
}
