// libregroup/src/groups.ts
// Clash/Mihomo-specific constants and group builders.
// Contains: fixed group names, shared load-balance fields, rule helpers.

import type { LoadBalanceGroup, SelectGroup } from './types.js';

// ─── Fixed Group Names ──────────────────────────────────────────────

export const DEFAULT_TRAFFIC = '默认流量';
export const NODE_SELECT = '节点选择';
export const ALL_NODES = '全部节点负载组';
export const DIRECT_CONNECT = '直接连接';

/** Names of the fixed groups after collisions with proxy names are resolved. */
export interface FixedGroupNames {
    defaultTraffic: string;
    nodeSelect: string;
    allNodes: string;
    directConnect: string;
    info: string;
}

/** Suffix of groups synthesized from decomposed stems. */
export const STEM_GROUP_SUFFIX = '负载组';

// ─── Load-balance Common Fields ─────────────────────────────────────

export interface LoadBalanceCommon {
    url: string;
    interval: number;
    strategy: string;
}

export const LB_COMMON: Readonly<LoadBalanceCommon> = {
    url: 'http://www.gstatic.com/generate_204',
    interval: 180,
    strategy: 'consistent-hashing',
};

/** Anchor name under which the emitter shares `LB_COMMON`. */
export const LB_ANCHOR = 'lb_common';

// ─── Group Builders ─────────────────────────────────────────────────

export function selectGroup(name: string, proxies: readonly string[]): SelectGroup {
    return { type: 'select', name, proxies: [...proxies] };
}

/**
 * Create a load-balance group carrying the common health-check fields.
 * Membership is either `includeAll` plus filters, or an explicit list.
 */
export function loadBalanceGroup(
    name: string,
    membership:
        | { includeAll: true; filter?: string; excludeFilter?: string }
        | { proxies: readonly string[] },
): LoadBalanceGroup {
    if ('proxies' in membership) {
        return { type: 'load-balance', name, proxies: [...membership.proxies], ...LB_COMMON };
    }
    const { filter, excludeFilter } = membership;
    return {
        type: 'load-balance',
        name,
        includeAll: true,
        ...(filter !== undefined ? { filter } : {}),
        ...(excludeFilter !== undefined ? { excludeFilter } : {}),
        ...LB_COMMON,
    };
}

// ─── Rules ──────────────────────────────────────────────────────────

/**
 * Create a rule string.
 * rule('GEOIP', 'CN', 'DIRECT') => 'GEOIP,CN,DIRECT'
 */
export function rule(type: string, ...params: string[]): string {
    return [type, ...params].join(',');
}

/**
 * LAN and mainland addresses go direct, everything else follows the default
 * selector. GEOIP rules resolve hostnames (no `no-resolve`).
 */
export function defaultRules(
    { directConnect, defaultTraffic }: Pick<FixedGroupNames, 'directConnect' | 'defaultTraffic'>,
): string[] {
    return [
        rule('GEOIP', 'LAN', directConnect),
        rule('GEOIP', 'CN', directConnect),
        rule('MATCH', defaultTraffic),
    ];
}

/** Rules for a document whose fixed groups kept their names. */
export const RULES: readonly string[] = defaultRules({
    directConnect: DIRECT_CONNECT,
    defaultTraffic: DEFAULT_TRAFFIC,
});

// ─── General Settings ───────────────────────────────────────────────

export const GENERAL_SETTINGS: Readonly<Record<string, unknown>> = {
    port: 7890,
    'socks-port': 7891,
    'allow-lan': true,
    mode: 'rule',
    'log-level': 'info',
    'external-controller': '127.0.0.1:9090',
};
