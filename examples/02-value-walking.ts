/**
 * Value Walking Example
 *
 * Builds a tree straight from a JavaScript value. Binary data is embedded
 * as base64 text, big integers stay bigint.
 *
 * Run: npx tsx examples/02-value-walking.ts
 */

import { BASE64_URL, TreeMap, TreeSequence, toTree } from '../src/index.js';

function main() {
    console.log('--- Value Walking Example ---\n');

    const tree = toTree({
        id: 9007199254740993n,
        name: 'thumbnail',
        tags: ['small', 'png'],
        data: new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
        createdAt: new Date(0),
    }, { alphabet: BASE64_URL });

    if (tree instanceof TreeMap) {
        for (const [key, value] of tree) {
            const shown = value instanceof TreeSequence ? `[${[...value].join(', ')}]` : String(value);
            console.log(`  ${key}: ${shown}`);
        }
    }

    console.log('\n--- Done ---');
}

main();
