// Type declarations for the parts of jstat this library calls.
// jstat ships no typings of its own.

declare module 'jstat' {
  export interface jStat {
    beta: {
      sample(alpha: number, beta: number): number;
      inv(p: number, alpha: number, beta: number): number;
    };

    normal: {
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };

    mean(data: number[]): number;
    percentile(data: number[], k: number, exclusive?: boolean): number;
  }

  const jStat: jStat;
  export default jStat;
}
