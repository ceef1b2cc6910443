/**
 * @module numeric/complex
 * @description Complex number arithmetic for network calculations
 *
 * Instances are never mutated by the library: every operation returns a new value.
 */

// ==================== Complex Number Class ====================

export class Complex {
    constructor(public readonly real: number, public readonly imag: number = 0) { }

    static readonly ZERO = new Complex(0, 0);
    static readonly ONE = new Complex(1, 0);

    static fromPolar(magnitude: number, phase: number): Complex {
        return new Complex(
            magnitude * Math.cos(phase),
            magnitude * Math.sin(phase)
        );
    }

    add(other: Complex): Complex {
        return new Complex(this.real + other.real, this.imag + other.imag);
    }

    subtract(other: Complex): Complex {
        return new Complex(this.real - other.real, this.imag - other.imag);
    }

    multiply(other: Complex): Complex {
        return new Complex(
            this.real * other.real - this.imag * other.imag,
            this.real * other.imag + this.imag * other.real
        );
    }

    divide(other: Complex): Complex {
        const denom = other.real * other.real + other.imag * other.imag;
        return new Complex(
            (this.real * other.real + this.imag * other.imag) / denom,
            (this.imag * other.real - this.real * other.imag) / denom
        );
    }

    reciprocal(): Complex {
        return Complex.ONE.divide(this);
    }

    scale(factor: number): Complex {
        return new Complex(this.real * factor, this.imag * factor);
    }

    /** Add a real number */
    offset(value: number): Complex {
        return new Complex(this.real + value, this.imag);
    }

    negate(): Complex {
        return new Complex(-this.real, -this.imag);
    }

    conjugate(): Complex {
        return new Complex(this.real, -this.imag);
    }

    magnitude(): number {
        return Math.hypot(this.real, this.imag);
    }

    phase(): number {
        return Math.atan2(this.imag, this.real);
    }

    isFinite(): boolean {
        return Number.isFinite(this.real) && Number.isFinite(this.imag);
    }

    toString(): string {
        const sign = this.imag >= 0 ? '+' : '-';
        return `${this.real.toFixed(4)} ${sign} ${Math.abs(this.imag).toFixed(4)}j`;
    }
}

// ==================== Helpers ====================

/**
 * Shorthand constructor
 */
export function complex(real: number, imag: number = 0): Complex {
    return new Complex(real, imag);
}

/**
 * Replace a value whose magnitude is below `epsilon` with the real number `epsilon`.
 */
export function floorMagnitude(value: Complex, epsilon: number): Complex {
    return value.magnitude() < epsilon ? new Complex(epsilon, 0) : value;
}

/**
 * Magnitude of each element
 */
export function magnitudes(values: readonly Complex[]): number[] {
    return values.map(v => v.magnitude());
}
