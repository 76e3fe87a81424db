#!/usr/bin/env node

import { resolve } from 'path';
import { createNetworkClient } from '../http/client.js';
import { fileSink } from '../http/sink.js';
import { createMultiDownloadConfig, createRequestConfig } from '../http/types.js';
import { CliOptions, USAGE, parseArgs } from './args.js';
import { logger } from '../utils/logger.js';

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(1);
  }

  const outputPath = resolve(options.output);
  const client = createNetworkClient();
  const startTime = Date.now();

  const result = await client.segmentedDownload(
    createMultiDownloadConfig({
      config: createRequestConfig({
        url: options.url,
        onProgress: (bytes) => {
          process.stdout.write(`\rDownloaded ${bytes} bytes`);
        },
      }),
      approach: options.approach,
      segmentParam: options.segmentParam,
      segmentRetry:
        options.retries === undefined
          ? undefined
          : { maxRetries: options.retries, retryDelay: options.retryDelay ?? 150 },
    }),
    fileSink(outputPath)
  );
  process.stdout.write('\n');

  if (!result.isSuccess()) {
    logger().error('Download failed', {
      statusCode: result.statusCode,
      error: result.errorMessage,
      detail: result.detailedErrorMessage,
    });
    process.exit(1);
  }

  logger().info('Download completed', {
    path: result.content.path,
    size: result.content.size,
    statusCode: result.statusCode,
    duration: Date.now() - startTime,
  });
}

main().catch((error: unknown) => {
  logger().error('Unexpected failure', { error });
  process.exit(1);
});
