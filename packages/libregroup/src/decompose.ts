// libregroup/src/decompose.ts
// Name decomposition for region auto-detection: "香港-01" and "香港-02"
// share the stem "香港", "SG01" and "SG02" share "SG".

export const STEM_DELIMITERS: readonly string[] = ['-', '_', ' ', '|', '·', '｜', '#', '@'];

export interface DecomposedName {
    stem: string;
    /** Stripped variant (delimiter included), empty when the name is its own stem. */
    suffix: string;
}

const TRAILING_DIGITS = /[0-9]+$/;

/**
 * Split a display name into stem and trailing variant.
 *
 * A numeric segment after the last delimiter wins over a bare digit run.
 * Names without either, and names whose stem would be blank, are their own
 * stem.
 */
export function decomposeName(name: string): DecomposedName {
    const whole: DecomposedName = { stem: name, suffix: '' };

    const digits = TRAILING_DIGITS.exec(name);
    if (!digits) return whole;

    const head = name.slice(0, digits.index);
    const lastChar = head.slice(-1);
    const stem = lastChar && STEM_DELIMITERS.includes(lastChar) ? head.slice(0, -1) : head;

    if (!stem.trim()) return whole;
    return { stem, suffix: name.slice(stem.length) };
}

/** Shorthand for `decomposeName(name).stem`. */
export function stemOf(name: string): string {
    return decomposeName(name).stem;
}
