import type { LocalTimeType, ZoneData } from './types.js';

function formatLine(label: string, ltt: LocalTimeType): string {
    return `${label.padStart(10)}: name:${ltt.name.padEnd(5)} offset:${String(ltt.offset).padStart(5)} DST:${String(ltt.isDst).padEnd(5)} type:${ltt.transitionType}`;
}

/**
 * Human-readable dump of a zone: the base regime, then every forward
 * transition in timestamp order.
 */
export function formatZone(zone: ZoneData): string[] {
    const lines = [formatLine('base', zone.base)];
    const sorted = [...zone.transitions].sort((a, b) => a.timestamp - b.timestamp);
    for (const t of sorted) {
        lines.push(formatLine(String(t.timestamp), t.localTimeType));
    }
    return lines;
}
