/**
 * Complex scalar used as a host value for complex-domain derivatives
 */
export class Complex {
  constructor(
    readonly re: number,
    readonly im: number = 0
  ) {}

  static from(value: number | Complex): Complex {
    return value instanceof Complex ? value : new Complex(value, 0);
  }

  add(other: number | Complex): Complex {
    const b = Complex.from(other);
    return new Complex(this.re + b.re, this.im + b.im);
  }

  mul(other: number | Complex): Complex {
    if (typeof other === 'number') {
      return new Complex(this.re * other, this.im * other);
    }
    // (a + bi)(c + di) = (ac - bd) + (ad + bc)i
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  conj(): Complex {
    return new Complex(this.re, -this.im);
  }

  /**
   * Squared magnitude, |z|^2
   */
  abs2(): number {
    return this.re * this.re + this.im * this.im;
  }

  equals(other: number | Complex): boolean {
    const b = Complex.from(other);
    return this.re === b.re && this.im === b.im;
  }

  toString(): string {
    const sign = this.im < 0 || Object.is(this.im, -0) ? '-' : '+';
    return `${this.re} ${sign} ${Math.abs(this.im)}im`;
  }
}
