/**
 * Shared error factory for shape-morph domain errors.
 *
 * Catalogue functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.unknownMapperStrategy(name);
 *
 * Library code throws the error classes below, which carry the same catalogue text.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// geometry
// ----------------------------------------------------------------------------

export function emptyVertexLoop(): DomainErrorResponse {
    return invalidArgument('A vertex loop needs at least one vertex.');
}

export function openOuterWithHoles(): DomainErrorResponse {
    return invalidArgument('Contours with holes need a closed outer loop.');
}

export function openHole(index: number): DomainErrorResponse {
    return invalidArgument(`Hole ${String(index)} is open. Holes must be closed loops.`);
}

// ----------------------------------------------------------------------------
// alignment / interpolation
// ----------------------------------------------------------------------------

export function lengthMismatch(length1: number, length2: number): DomainErrorResponse {
    return domainError(
        `Vertex lists must have the same length: ${String(length1)} != ${String(length2)}. ` +
        'Equalize vertex counts before aligning.',
    );
}

export function vertexCountMismatch(count1: number, count2: number): DomainErrorResponse {
    return domainError(
        `Cannot morph shapes with different vertex counts: ${String(count1)} != ${String(count2)}. ` +
        'Both shapes must use the same num_vertices.',
    );
}

export function easingOutOfRange(t: number): DomainErrorResponse {
    return invalidArgument(`Easing input must be within [0, 1], got ${String(t)}.`);
}

export function unknownEasing(name: string): DomainErrorResponse {
    return invalidArgument(`Unknown easing '${name}'.`);
}

export function unknownColor(value: string): DomainErrorResponse {
    return invalidArgument(`Cannot convert '${value}' to a color (not hex or a known name).`);
}

// ----------------------------------------------------------------------------
// mapping
// ----------------------------------------------------------------------------

export const MAPPER_STRATEGIES = ['clustering', 'greedy', 'hungarian', 'discrete', 'simple'] as const;

export function unknownMapperStrategy(name: string): DomainErrorResponse {
    return invalidArgument(
        `Unknown vertex loop mapper '${name}'. Valid options: ${MAPPER_STRATEGIES.map(s => `'${s}'`).join(', ')}.`,
    );
}

export function missingOptionalDependency(moduleName: string, strategy: string): DomainErrorResponse {
    const alternatives = MAPPER_STRATEGIES.filter(s => s !== strategy).join(', ');
    return domainError(
        `The '${strategy}' mapper requires the optional package '${moduleName}', which is not installed. ` +
        `Install it with "npm install ${moduleName}" or use one of: ${alternatives}.`,
    );
}

// ----------------------------------------------------------------------------
// timeline
// ----------------------------------------------------------------------------

export function timelineTooShort(): DomainErrorResponse {
    return invalidArgument('A timeline needs at least two keystates.');
}

export function keystateTimesNotIncreasing(index: number): DomainErrorResponse {
    return invalidArgument(`Keystate ${String(index)} must have a time greater than the previous keystate.`);
}

export function timeOutOfRange(t: number): DomainErrorResponse {
    return invalidArgument(`Time must be within [0, 1], got ${String(t)}.`);
}

// ----------------------------------------------------------------------------
// config
// ----------------------------------------------------------------------------

export function configFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Config file not found: ${path}`);
}

export function invalidConfigFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Config file ${path} is invalid: ${detail}`);
}

// ----------------------------------------------------------------------------
// Thrown errors
// ----------------------------------------------------------------------------

/**
 * Base class for errors thrown by the engine. The message is the catalogue text.
 */
export class MorphError extends Error {
    constructor(response: DomainErrorResponse) {
        super(response.content[0].text);
        this.name = new.target.name;
    }

    toResponse(): DomainErrorResponse {
        return domainError(this.message);
    }
}

export class InvalidArgumentError extends MorphError {}

export class LengthMismatchError extends MorphError {
    constructor(readonly length1: number, readonly length2: number) {
        super(lengthMismatch(length1, length2));
    }
}

export class VertexCountMismatchError extends MorphError {
    constructor(readonly count1: number, readonly count2: number) {
        super(vertexCountMismatch(count1, count2));
    }
}

export class MissingOptionalDependencyError extends MorphError {
    constructor(readonly moduleName: string, readonly strategy: string) {
        super(missingOptionalDependency(moduleName, strategy));
    }
}

/**
 * Converts anything caught in a tool handler into an MCP error response.
 */
export function toErrorResponse(e: unknown): DomainErrorResponse {
    if (e instanceof MorphError) {
        return e.toResponse();
    }
    return domainError(e instanceof Error ? e.message : String(e));
}
