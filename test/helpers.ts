import { pino, type Logger } from 'pino';
import { TreeGenerator } from '../src/generator.js';
import { TreeMap, TreeSequence, type TreeValue } from '../src/tree.js';

/**
 * Logger that writes nothing
 */
export const silent: Logger = pino({ level: 'silent' });

/**
 * Helper to create a generator that does not log
 */
export function createGenerator(): TreeGenerator {
    return new TreeGenerator({ logger: silent });
}

/**
 * Helper to run a sequence of write calls and return the generator
 */
export function generate(write: (generator: TreeGenerator) => void): TreeGenerator {
    const generator = createGenerator();
    write(generator);
    return generator;
}

/**
 * Helper to create a logger whose records are parsed into `lines`
 */
export function captureLogger(level: string): { logger: Logger; lines: Record<string, unknown>[] } {
    const lines: Record<string, unknown>[] = [];
    const logger = pino({ level }, {
        write(msg: string) {
            lines.push(JSON.parse(msg));
        },
    });
    return { logger, lines };
}

export function asMap(value: TreeValue | undefined): TreeMap {
    if (!(value instanceof TreeMap)) {
        throw new Error(`expected a map, got ${String(value)}`);
    }
    return value;
}

export function asSequence(value: TreeValue | undefined): TreeSequence {
    if (!(value instanceof TreeSequence)) {
        throw new Error(`expected a sequence, got ${String(value)}`);
    }
    return value;
}
