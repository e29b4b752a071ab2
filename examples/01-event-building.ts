/**
 * Event Building Example
 *
 * Drives a TreeGenerator call by call, the way a serialization engine
 * would, and inspects the tree while it is still open.
 *
 * Run: npx tsx examples/01-event-building.ts
 */

import { Decimal } from 'decimal.js';
import { TreeGenerator, StructuralViolationError, toPlain } from '../src/index.js';

function main() {
    console.log('--- Event Building Example ---\n');

    const generator = new TreeGenerator();

    generator.writeStartMap();
    generator.writeTextField('invoice', 'INV-0001');
    generator.writeNumberField('total', new Decimal('129.95'));
    generator.writeSequenceFieldStart('lines');

    console.log(`[open] state=${generator.getState()} depth=${generator.getDepth()}`);
    console.log('[open] tree so far:', toPlain(generator.get()));

    generator.writeStartMap();
    generator.writeTextField('sku', 'A-1');
    generator.writeNumberField('qty', 3);
    generator.writeEndMap();
    generator.writeEndSequence();
    generator.writeEndMap();

    console.log(`[done] state=${generator.getState()} depth=${generator.getDepth()}`);
    console.log('[done] tree:', toPlain(generator.get()));

    try {
        generator.writeText('trailing');
    } catch (err) {
        if (!(err instanceof StructuralViolationError)) throw err;
        console.log(`[rejected] ${err.message}`);
    }

    console.log('\n--- Done ---');
}

main();
