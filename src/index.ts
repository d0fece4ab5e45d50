#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { parseArgs } from 'node:util';
import logger from './lib/logger.js';
import { loadConfig, withModels } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { buildServices } from './services.js';
import { createApp, startServer } from './server.js';

export interface CliOptions {
  inputPath?: string;
  serve: boolean;
  brain?: string;
  coder?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      serve: { type: 'boolean', default: false },
      brain: { type: 'string' },
      coder: { type: 'string' },
    },
  });
  return {
    inputPath: positionals[0],
    serve: values.serve ?? false,
    brain: values.brain,
    coder: values.coder,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(argv);
  const config = withModels(loadConfig(), { brain: options.brain, coder: options.coder });
  const services = buildServices(config);

  if (!(await services.gateway.isAvailable())) {
    logger.warn({ host: config.ollamaHost }, 'Model runtime is not reachable; model calls will fail until it is started');
  }

  if (options.serve) {
    const app = createApp({
      gateway: services.gateway,
      analyzer: services.analyzer,
      generator: services.generator,
      allowedOrigins: config.allowedOrigins,
    });
    startServer(app, config.port);
    return 0;
  }

  const result = await services.pipeline.run(options.inputPath);
  return result.status === 'failed' ? 1 : 0;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  // npm links the bin entry through a symlink
  try {
    return realpathSync(path.resolve(entry)) === realpathSync(current);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.fatal({ error: errorMessage(err) }, 'Startup failed');
      process.exitCode = 1;
    });
}
