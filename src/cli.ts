#!/usr/bin/env node
import { createEchoService, NetProactor } from './index';

// Port of the `amqp` service
const DEFAULT_PORT = 5672;

export type CliArgs = {
  host: string;
  port: number;
};

/**
 * Positional arguments only: `[host] [port]`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const [host = '', rawPort] = argv;
  if (rawPort === undefined) {
    return { host, port: DEFAULT_PORT };
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${rawPort}`);
  }
  return { host, port };
}

export async function main(argv: string[]): Promise<number> {
  const { host, port } = parseArgs(argv);
  const engine = new NetProactor();
  const service = createEchoService(engine);
  engine.listen(host, port);
  return service.run();
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
      // a failed listener can leave sockets and the timer behind
      if (code !== 0) process.exit();
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    },
  );
}
