// dnsplan/src/behaviors/labels.ts — disambiguating components for glue labels

import { randomBytes } from 'node:crypto';

export interface LabelSource {
    next(): string;
}

/** Six random hex digits per label. */
export function randomLabels(): LabelSource {
    return { next: () => randomBytes(3).toString('hex') };
}

/** `1`, `2`, `3`, ... for reproducible output. */
export function sequentialLabels(start = 1): LabelSource {
    let counter = start;
    return { next: () => String(counter++) };
}

/** Label of the glue host generated for an internal NS target. */
export function glueLabel(target: string, labels: LabelSource): string {
    return `ns-${target}-${labels.next()}`;
}
