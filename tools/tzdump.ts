/**
 * CLI: Zone dump
 *
 * Usage:  tsx tools/tzdump.ts [--limits none|sensible] [--verbose] FILE...
 *
 * Decodes each compiled zone file and prints its base regime followed by
 * every transition in timestamp order.
 */

import { decodeFile, formatZone, type LimitProfile, type TzifLogger } from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

function isLimitProfile(value: string): value is LimitProfile {
    return value === 'none' || value === 'sensible';
}

const limitsArg = getArg('limits', 'sensible');
const verbose = args.includes('--verbose');
const files = args.filter((a, i) => !a.startsWith('--') && args[i - 1] !== '--limits');

const consoleLogger: TzifLogger = {
    info: msg => console.error(`info: ${msg}`),
    warn: msg => console.error(`warn: ${msg}`),
    error: msg => console.error(`error: ${msg}`),
};

// --- Main ---
async function main(): Promise<number> {
    if (!isLimitProfile(limitsArg)) {
        console.error(`Unknown limit profile: ${limitsArg} (expected none|sensible)`);
        return 2;
    }
    if (files.length === 0) {
        console.error('Usage: tzdump [--limits none|sensible] [--verbose] FILE...');
        return 2;
    }

    let failures = 0;
    for (const file of files) {
        try {
            const zone = await decodeFile(file, { limits: limitsArg, logger: verbose ? consoleLogger : null });
            if (files.length > 1) console.log(`${file}:`);
            for (const line of formatZone(zone)) console.log(line);
        } catch (err: unknown) {
            failures++;
            const name = err instanceof Error ? err.name : 'Error';
            const message = err instanceof Error ? err.message : String(err);
            console.error(`${file}: ${name}: ${message}`);
        }
    }
    return failures > 0 ? 1 : 0;
}

process.exitCode = await main();
