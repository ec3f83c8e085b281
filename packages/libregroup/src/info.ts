// libregroup/src/info.ts
// Info nodes: pseudo-proxies whose names announce traffic, expiry or the
// provider's website instead of describing a server.

import { regexMatcher } from './matcher.js';

export const INFO_BUCKET = '订阅信息';

export const INFO_KEYWORDS: readonly string[] = [
    '官网', '网址', '网站', '流量', '到期', '过期', '订阅', '套餐',
    '剩余', '重置', '时间', 'TG群', '更新', '公告',
    'expire', 'traffic', 'remaining', 'website',
];

/** Pattern body shared by the predicate and the client-side exclude filter. */
export const INFO_PATTERN = INFO_KEYWORDS.join('|');

const infoMatcher = regexMatcher(INFO_PATTERN);

export function isInfoNode(name: string): boolean {
    return infoMatcher.regex.test(name);
}
