declare module 'bole' {
  namespace bole {
    interface Logger {
      (name: string): Logger
      debug(...args: unknown[]): void
      info(...args: unknown[]): void
      warn(...args: unknown[]): void
      error(...args: unknown[]): void
    }

    interface OutputOptions {
      level: string
      stream: NodeJS.WritableStream
    }

    function output(options: OutputOptions | OutputOptions[]): typeof bole
    function reset(): typeof bole
  }

  function bole(name: string): bole.Logger
  export = bole
}

declare module 'are-we-dev' {
  function isDev(): boolean
  export = isDev
}

declare module 'bistre' {
  import { Transform } from 'stream'

  function bistre(options?: { time?: boolean }): Transform
  export = bistre
}
