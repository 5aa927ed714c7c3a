export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  /** Resolves with everything written to stdin until it ends. */
  readStdin(): Promise<string>;
  exit(code: number): never;
}
