#!/usr/bin/env node
import { config } from './config.js';
import { USAGE, parseCli, type CliOptions } from './cli/args.js';
import { startRecording } from './cli/record.js';
import { runCalibration } from './cli/calibrate.js';
import { probeDevices } from './cli/devices.js';
import { installShutdownHooks } from './cli/shutdown.js';
import { StartupError, describeError } from './errors.js';
import { logger } from './logger.js';

async function boot(options: CliOptions) {
  switch (options.command) {
    case 'calibrate': {
      await runCalibration(config, options);
      return 0;
    }
    case 'devices': {
      const results = await probeDevices(config, options);
      return results.some((result) => result.ok) ? 0 : 1;
    }
    case 'record': {
      const runtime = await startRecording(config, options);
      installShutdownHooks({ shutdown: runtime.shutdown });
      return null;
    }
  }
}

let options: CliOptions;
try {
  options = parseCli(process.argv.slice(2));
} catch (error) {
  console.error(describeError(error));
  console.error(USAGE);
  process.exit(2);
}

if (options.help) {
  console.log(USAGE);
  process.exit(0);
}

boot(options)
  .then((code) => {
    if (code !== null) process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof StartupError) {
      logger.fatal({ code: error.code }, error.message);
      console.error(error.guidance);
    } else {
      logger.fatal({ error: describeError(error) }, 'Fatal boot error');
    }
    process.exit(1);
  });
