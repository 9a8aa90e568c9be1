/**
 * @file Placeholder Keys
 *
 * Anonymous slots handed out during normalization. A placeholder never
 * reaches a finished mapping: the merger either replaces it with an
 * integer or collapses it away.
 *
 * @module dag/normalize
 */

export class Placeholder {
    /**
     * @param scalar - Whether the slot holds a bare reference rather than
     *                 an element of a collection
     * @param token - Identifier unique within its factory
     */
    constructor(
        readonly scalar: boolean,
        readonly token: number,
    ) {
        Object.freeze(this);
    }
}

/**
 * Issues placeholders with increasing tokens. One factory serves one
 * conversion (one task, one declaration kind).
 */
export class PlaceholderFactory {
    private nextToken: number = 0;

    placeholder_create(scalar: boolean = false): Placeholder {
        return new Placeholder(scalar, this.nextToken++);
    }
}
