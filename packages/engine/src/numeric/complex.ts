// ─── Complex ───────────────────────────────────────────────────────
// Double-precision complex numbers. Immutable: every operation returns
// a new instance. Branch cuts follow the usual principal values.

export class Complex {
  constructor(
    readonly re: number,
    readonly im: number = 0
  ) {}

  static readonly ZERO = new Complex(0, 0);
  static readonly ONE = new Complex(1, 0);
  static readonly I = new Complex(0, 1);

  static fromPolar(r: number, theta: number): Complex {
    return new Complex(r * Math.cos(theta), r * Math.sin(theta));
  }

  isZero(): boolean {
    return this.re === 0 && this.im === 0;
  }

  add(other: Complex): Complex {
    return new Complex(this.re + other.re, this.im + other.im);
  }

  sub(other: Complex): Complex {
    return new Complex(this.re - other.re, this.im - other.im);
  }

  mul(other: Complex): Complex {
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  /** Division by zero yields NaN parts, never throws. */
  div(other: Complex): Complex {
    const normSqr = other.re * other.re + other.im * other.im;
    return new Complex(
      (this.re * other.re + this.im * other.im) / normSqr,
      (this.im * other.re - this.re * other.im) / normSqr
    );
  }

  scale(factor: number): Complex {
    return new Complex(this.re * factor, this.im * factor);
  }

  neg(): Complex {
    return new Complex(-this.re, -this.im);
  }

  conj(): Complex {
    return new Complex(this.re, -this.im);
  }

  /** Modulus |z|. */
  norm(): number {
    return Math.hypot(this.re, this.im);
  }

  /** Principal argument in (-π, π]. */
  arg(): number {
    return Math.atan2(this.im, this.re);
  }

  exp(): Complex {
    return Complex.fromPolar(Math.exp(this.re), this.im);
  }

  ln(): Complex {
    return new Complex(Math.log(this.norm()), this.arg());
  }

  /** Logarithm in a real base. */
  log(base: number): Complex {
    return this.ln().scale(1 / Math.log(base));
  }

  sqrt(): Complex {
    if (this.im === 0) {
      if (this.re >= 0) return new Complex(Math.sqrt(this.re), this.im);
      const root = Math.sqrt(-this.re);
      return new Complex(0, Object.is(this.im, -0) ? -root : root);
    }
    return Complex.fromPolar(Math.sqrt(this.norm()), this.arg() / 2);
  }

  /** z^w = exp(w · ln z), with z^0 = 1 and 0^w = 0. */
  powc(exponent: Complex): Complex {
    if (exponent.isZero()) return Complex.ONE;
    if (this.isZero()) return Complex.ZERO;
    return exponent.mul(this.ln()).exp();
  }

  sin(): Complex {
    return new Complex(
      Math.sin(this.re) * Math.cosh(this.im),
      Math.cos(this.re) * Math.sinh(this.im)
    );
  }

  cos(): Complex {
    return new Complex(
      Math.cos(this.re) * Math.cosh(this.im),
      -Math.sin(this.re) * Math.sinh(this.im)
    );
  }

  tan(): Complex {
    const twoRe = 2 * this.re;
    const twoIm = 2 * this.im;
    return new Complex(Math.sin(twoRe), Math.sinh(twoIm)).scale(
      1 / (Math.cos(twoRe) + Math.cosh(twoIm))
    );
  }

  /** asin z = -i · ln(iz + √(1 - z²)) */
  asin(): Complex {
    const iz = Complex.I.mul(this);
    const root = Complex.ONE.sub(this.mul(this)).sqrt();
    return Complex.I.neg().mul(iz.add(root).ln());
  }

  /** acos z = -i · ln(z + i√(1 - z²)) */
  acos(): Complex {
    const root = Complex.ONE.sub(this.mul(this)).sqrt();
    return Complex.I.neg().mul(this.add(Complex.I.mul(root)).ln());
  }

  /** atan z = (ln(1 + iz) - ln(1 - iz)) / 2i */
  atan(): Complex {
    if (this.im === 0) return new Complex(Math.atan(this.re), 0);
    const iz = Complex.I.mul(this);
    const numerator = Complex.ONE.add(iz).ln().sub(Complex.ONE.sub(iz).ln());
    return numerator.div(new Complex(0, 2));
  }

  sinh(): Complex {
    return new Complex(
      Math.sinh(this.re) * Math.cos(this.im),
      Math.cosh(this.re) * Math.sin(this.im)
    );
  }

  cosh(): Complex {
    return new Complex(
      Math.cosh(this.re) * Math.cos(this.im),
      Math.sinh(this.re) * Math.sin(this.im)
    );
  }

  tanh(): Complex {
    const twoRe = 2 * this.re;
    const twoIm = 2 * this.im;
    return new Complex(Math.sinh(twoRe), Math.sin(twoIm)).scale(
      1 / (Math.cosh(twoRe) + Math.cos(twoIm))
    );
  }

  equals(other: Complex): boolean {
    return this.re === other.re && this.im === other.im;
  }

  toString(): string {
    return this.im < 0
      ? `${this.re} - ${-this.im}i`
      : `${this.re} + ${this.im}i`;
  }
}
