// Type declarations for the parts of jstat used here

declare module 'jstat' {
  export interface jStat {
    normal: {
      inv(p: number, mean: number, std: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
