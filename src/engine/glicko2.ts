import { P } from './params.js';
import type { Rating, RatingUpdater } from './types.js';

export const WIN = 1;
export const DRAW = 0.5;
export const LOSS = 0;

export interface Glicko2Options {
  mu?: number;
  phi?: number;
  sigma?: number;
  tau?: number;
  epsilon?: number;
}

export interface Glicko2 extends RatingUpdater {
  readonly tau: number;
  createRating(partial?: Partial<Rating>): Rating;
  rate(rating: Rating, series: Array<[score: number, opponent: Rating]>): Rating;
}

// Internal (Glicko-2 scale) rating; mu is centred on the system default.
type Scaled = { mu: number; phi: number; sigma: number };

const reduceImpact = (r: Scaled) => 1 / Math.sqrt(1 + (3 * r.phi * r.phi) / (Math.PI * Math.PI));
const expectScore = (r: Scaled, other: Scaled, impact: number) =>
  1 / (1 + Math.exp(-impact * (r.mu - other.mu)));

export function createGlicko2(options: Glicko2Options = {}): Glicko2 {
  const defaults = {
    mu: options.mu ?? P.glicko.mu,
    phi: options.phi ?? P.glicko.phi,
    sigma: options.sigma ?? P.glicko.sigma,
  };
  const tau = options.tau ?? P.glicko.tau;
  const epsilon = options.epsilon ?? P.glicko.epsilon;
  const ratio = P.glicko.scale;

  if (!(tau > 0)) throw new RangeError(`tau must be positive, got ${tau}`);

  const scaleDown = (r: Rating): Scaled => ({
    mu: (r.mu - defaults.mu) / ratio,
    phi: r.phi / ratio,
    sigma: r.sigma,
  });
  const scaleUp = (r: Scaled): Rating => ({
    mu: r.mu * ratio + defaults.mu,
    phi: r.phi * ratio,
    sigma: r.sigma,
  });

  // Illinois iteration for the new volatility (Glickman, step 5).
  const determineSigma = (r: Scaled, difference: number, variance: number) => {
    const phi2 = r.phi * r.phi;
    const diff2 = difference * difference;
    const alpha = Math.log(r.sigma * r.sigma);
    const tau2 = tau * tau;
    const f = (x: number) => {
      const ex = Math.exp(x);
      const tmp = phi2 + variance + ex;
      return (ex * (diff2 - tmp)) / (2 * tmp * tmp) - (x - alpha) / tau2;
    };

    let a = alpha;
    let b: number;
    if (diff2 > phi2 + variance) {
      b = Math.log(diff2 - phi2 - variance);
    } else {
      let k = 1;
      while (f(alpha - k * tau) < 0) k += 1;
      b = alpha - k * tau;
    }

    let fa = f(a);
    let fb = f(b);
    while (Math.abs(b - a) > epsilon) {
      const c = a + ((a - b) * fa) / (fb - fa);
      const fc = f(c);
      if (fc * fb < 0) {
        a = b;
        fa = fb;
      } else {
        fa /= 2;
      }
      b = c;
      fb = fc;
    }
    return Math.exp(a / 2);
  };

  const rate = (rating: Rating, series: Array<[number, Rating]>): Rating => {
    const r = scaleDown(rating);
    if (!series.length) {
      // no games this period: only the deviation grows
      return scaleUp({ ...r, phi: Math.sqrt(r.phi * r.phi + r.sigma * r.sigma) });
    }

    let varianceInv = 0;
    let difference = 0;
    for (const [score, opponentRating] of series) {
      const opponent = scaleDown(opponentRating);
      const impact = reduceImpact(opponent);
      const expected = expectScore(r, opponent, impact);
      varianceInv += impact * impact * expected * (1 - expected);
      difference += impact * (score - expected);
    }
    const variance = 1 / varianceInv;
    const improvement = difference * variance;

    const sigma = determineSigma(r, improvement, variance);
    const phiStar = Math.sqrt(r.phi * r.phi + sigma * sigma);
    const phi = 1 / Math.sqrt(1 / (phiStar * phiStar) + varianceInv);
    const mu = r.mu + phi * phi * difference;
    return scaleUp({ mu, phi, sigma });
  };

  return {
    tau,
    createRating: (partial = {}) => ({ ...defaults, ...partial }),
    rate,
    update(first, second, drawn) {
      return [
        rate(first, [[drawn ? DRAW : WIN, second]]),
        rate(second, [[drawn ? DRAW : LOSS, first]]),
      ];
    },
  };
}
