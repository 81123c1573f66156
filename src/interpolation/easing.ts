import * as errors from '../errors.js';

/**
 * Maps normalized time [0, 1] onto progress. Output may leave [0, 1] for overshoot effects.
 */
export type EasingFunction = (t: number) => number;

/**
 * Easing functions keyed by state field name.
 */
export type EasingTable = Readonly<Record<string, EasingFunction>>;

function checked(fn: EasingFunction): EasingFunction {
    return (t: number) => {
        if (!(t >= 0 && t <= 1)) {
            throw new errors.InvalidArgumentError(errors.easingOutOfRange(t));
        }
        return fn(t);
    };
}

const C1 = 1.70158;
const C2 = C1 * 1.525;
const C3 = C1 + 1;
const C4 = (2 * Math.PI) / 3;
const C5 = (2 * Math.PI) / 4.5;
const N1 = 7.5625;
const D1 = 2.75;

function bounceOut(t: number): number {
    if (t < 1 / D1) {
        return N1 * t * t;
    } else if (t < 2 / D1) {
        const u = t - 1.5 / D1;
        return N1 * u * u + 0.75;
    } else if (t < 2.5 / D1) {
        const u = t - 2.25 / D1;
        return N1 * u * u + 0.9375;
    }
    const u = t - 2.625 / D1;
    return N1 * u * u + 0.984375;
}

/** Holds the start value until the very end. */
export const none = checked(t => (t >= 1 ? 1 : 0));
/** Switches halfway. */
export const step = checked(t => (t < 0.5 ? 0 : 1));
export const linear = checked(t => t);
/** Smoothstep. */
export const inOut = checked(t => t * t * (3 - 2 * t));

export const inQuad = checked(t => t * t);
export const outQuad = checked(t => 1 - (1 - t) * (1 - t));
export const inOutQuad = checked(t => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2));

export const inCubic = checked(t => t ** 3);
export const outCubic = checked(t => 1 - (1 - t) ** 3);
export const inOutCubic = checked(t => (t < 0.5 ? 4 * t ** 3 : 1 - (-2 * t + 2) ** 3 / 2));

export const inQuart = checked(t => t ** 4);
export const outQuart = checked(t => 1 - (1 - t) ** 4);
export const inOutQuart = checked(t => (t < 0.5 ? 8 * t ** 4 : 1 - (-2 * t + 2) ** 4 / 2));

export const inQuint = checked(t => t ** 5);
export const outQuint = checked(t => 1 - (1 - t) ** 5);
export const inOutQuint = checked(t => (t < 0.5 ? 16 * t ** 5 : 1 - (-2 * t + 2) ** 5 / 2));

export const inSine = checked(t => 1 - Math.cos((t * Math.PI) / 2));
export const outSine = checked(t => Math.sin((t * Math.PI) / 2));
export const inOutSine = checked(t => -(Math.cos(Math.PI * t) - 1) / 2);

export const inExpo = checked(t => (t === 0 ? 0 : 2 ** (10 * t - 10)));
export const outExpo = checked(t => (t === 1 ? 1 : 1 - 2 ** (-10 * t)));
export const inOutExpo = checked(t => {
    if (t === 0) return 0;
    if (t === 1) return 1;
    return t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2;
});

export const inCirc = checked(t => 1 - Math.sqrt(1 - t * t));
export const outCirc = checked(t => Math.sqrt(1 - (t - 1) ** 2));
export const inOutCirc = checked(t =>
    t < 0.5 ? (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2 : (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2,
);

export const inBack = checked(t => C3 * t ** 3 - C1 * t * t);
export const outBack = checked(t => 1 + C3 * (t - 1) ** 3 + C1 * (t - 1) ** 2);
export const inOutBack = checked(t =>
    t < 0.5
        ? ((2 * t) ** 2 * ((C2 + 1) * 2 * t - C2)) / 2
        : ((2 * t - 2) ** 2 * ((C2 + 1) * (t * 2 - 2) + C2) + 2) / 2,
);

export const inElastic = checked(t => {
    if (t === 0 || t === 1) return t;
    return -(2 ** (10 * t - 10)) * Math.sin((t * 10 - 10.75) * C4);
});
export const outElastic = checked(t => {
    if (t === 0 || t === 1) return t;
    return 2 ** (-10 * t) * Math.sin((t * 10 - 0.75) * C4) + 1;
});
export const inOutElastic = checked(t => {
    if (t === 0 || t === 1) return t;
    return t < 0.5
        ? -(2 ** (20 * t - 10) * Math.sin((20 * t - 11.125) * C5)) / 2
        : (2 ** (-20 * t + 10) * Math.sin((20 * t - 11.125) * C5)) / 2 + 1;
});

export const inBounce = checked(t => 1 - bounceOut(1 - t));
export const outBounce = checked(bounceOut);
export const inOutBounce = checked(t =>
    t < 0.5 ? (1 - bounceOut(1 - 2 * t)) / 2 : (1 + bounceOut(2 * t - 1)) / 2,
);

/**
 * Every built-in easing, addressable by name.
 */
export const EASINGS = {
    none,
    step,
    linear,
    inOut,
    inQuad, outQuad, inOutQuad,
    inCubic, outCubic, inOutCubic,
    inQuart, outQuart, inOutQuart,
    inQuint, outQuint, inOutQuint,
    inSine, outSine, inOutSine,
    inExpo, outExpo, inOutExpo,
    inCirc, outCirc, inOutCirc,
    inBack, outBack, inOutBack,
    inElastic, outElastic, inOutElastic,
    inBounce, outBounce, inOutBounce,
} as const satisfies Record<string, EasingFunction>;

export type EasingName = keyof typeof EASINGS;

export const EASING_NAMES = Object.keys(EASINGS);

function normalizeName(name: string): string {
    return name.replace(/[_\-\s]/g, '').toLowerCase();
}

const BY_NORMALIZED_NAME = new Map<string, EasingFunction>(
    Object.entries(EASINGS).map(([name, fn]) => [normalizeName(name), fn]),
);

/**
 * Looks up an easing by name. Accepts camelCase (`inOutQuad`) and snake_case (`in_out_quad`).
 */
export function getEasing(name: string): EasingFunction {
    const fn = BY_NORMALIZED_NAME.get(normalizeName(name));
    if (!fn) {
        throw new errors.InvalidArgumentError(errors.unknownEasing(name));
    }
    return fn;
}
