declare module 'written-number' {
  interface WrittenNumberOptions {
    lang?: string;
    noAnd?: boolean;
    alternativeBase?: string;
  }

  function writtenNumber(n: number, options?: WrittenNumberOptions): string;

  export = writtenNumber;
}
