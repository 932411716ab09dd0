export const P = {
  glicko: {
    mu: 1500,
    phi: 350,
    sigma: 0.06,
    // system constant constraining volatility change; 0.5 matches club practice
    tau: 0.5,
    epsilon: 0.000001,
    scale: 173.7178,
  },
  output: {
    sigmaDigits: 8,
  },
} as const;
