// libregroup/src/emit.ts
// Serializes proxies, groups and rules into one YAML document.
//
// The first load-balance group carries the shared health-check fields under
// a merge key with an anchor; later groups with the same fields reference
// the anchor instead of repeating them:
//
//   - name: 全部节点负载组
//     type: load-balance
//     include-all: true
//     <<: &lb_common
//       url: http://www.gstatic.com/generate_204
//       interval: 180
//       strategy: consistent-hashing
//   - name: 香港负载组
//     ...
//     <<: *lb_common

import { Document, YAMLMap, YAMLSeq } from 'yaml';
import type { CreateNodeOptions } from 'yaml';
import { EmitError } from './errors.js';
import { LB_ANCHOR } from './groups.js';
import type { LoadBalanceCommon } from './groups.js';
import type { Group, LoadBalanceGroup, ProxyEntry } from './types.js';

export const MERGE_KEY = '<<';

const NODE_OPTIONS: CreateNodeOptions = { aliasDuplicateObjects: false };

export interface EmitInput {
    proxies: readonly ProxyEntry[];
    /** Groups in emission order. */
    groups: readonly Group[];
    rules: readonly string[];
    /** Top-level settings written before `proxies`. */
    general?: Readonly<Record<string, unknown>>;
}

interface SharedBundle {
    node: YAMLMap;
    fields: LoadBalanceCommon;
}

/**
 * Render the document. Identical input always renders identical text:
 * keys keep insertion order and long scalars are never folded.
 */
export function emitDocument({ proxies, groups, rules, general }: EmitInput): string {
    const doc = new Document();
    const root = new YAMLMap();

    for (const [key, value] of Object.entries(general ?? {})) {
        assertSerializable(value, key);
        root.add(doc.createPair(key, value, NODE_OPTIONS));
    }

    const proxySeq = new YAMLSeq();
    for (const proxy of proxies) {
        assertSerializable(proxy.fields, `proxies[${proxy.name}]`);
        proxySeq.add(doc.createNode(proxy.fields, NODE_OPTIONS));
    }
    root.add(doc.createPair('proxies', proxySeq, NODE_OPTIONS));

    const groupSeq = new YAMLSeq();
    let shared: SharedBundle | undefined;
    for (const group of groups) {
        const node = new YAMLMap();
        const put = (key: string, value: unknown): void => {
            if (value === undefined) return;
            node.add(doc.createPair(key, value, NODE_OPTIONS));
        };

        put('name', group.name);
        put('type', group.type);
        switch (group.type) {
            case 'select':
                put('proxies', [...group.proxies]);
                break;
            case 'load-balance': {
                put('proxies', group.proxies && [...group.proxies]);
                put('include-all', group.includeAll);
                put('filter', group.filter);
                put('exclude-filter', group.excludeFilter);

                const fields = commonFields(group);
                if (!shared) {
                    const bundle = new YAMLMap();
                    bundle.add(doc.createPair('url', fields.url, NODE_OPTIONS));
                    bundle.add(doc.createPair('interval', fields.interval, NODE_OPTIONS));
                    bundle.add(doc.createPair('strategy', fields.strategy, NODE_OPTIONS));
                    bundle.anchor = LB_ANCHOR;
                    shared = { node: bundle, fields };
                    put(MERGE_KEY, bundle);
                } else if (sameFields(shared.fields, fields)) {
                    put(MERGE_KEY, doc.createAlias(shared.node));
                } else {
                    put('url', fields.url);
                    put('interval', fields.interval);
                    put('strategy', fields.strategy);
                }
                break;
            }
        }
        groupSeq.add(node);
    }
    root.add(doc.createPair('proxy-groups', groupSeq, NODE_OPTIONS));
    root.add(doc.createPair('rules', [...rules], NODE_OPTIONS));

    doc.contents = root;
    try {
        return doc.toString({ lineWidth: 0 });
    } catch (err) {
        throw new EmitError('Failed to serialize YAML', { cause: err });
    }
}

function commonFields({ url, interval, strategy }: LoadBalanceGroup): LoadBalanceCommon {
    return { url, interval, strategy };
}

function sameFields(a: LoadBalanceCommon, b: LoadBalanceCommon): boolean {
    return a.url === b.url && a.interval === b.interval && a.strategy === b.strategy;
}

/** Reject values YAML cannot represent, before anything is rendered. */
function assertSerializable(value: unknown, path: string): void {
    switch (typeof value) {
        case 'function':
        case 'symbol':
        case 'undefined':
            throw new EmitError(`Cannot serialize ${typeof value} at ${path}`);
        case 'number':
            if (!Number.isFinite(value)) {
                throw new EmitError(`Cannot serialize non-finite number at ${path}`);
            }
            return;
        case 'object':
            if (value === null || value instanceof Date) return;
            if (Array.isArray(value)) {
                value.forEach((item, i) => assertSerializable(item, `${path}[${i}]`));
                return;
            }
            for (const [key, item] of Object.entries(value)) {
                assertSerializable(item, `${path}.${key}`);
            }
            return;
        default:
            return;
    }
}
