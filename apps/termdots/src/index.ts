#!/usr/bin/env tsx
import 'dotenv/config';
import { Sentry } from './instrument.js';
import { runCli } from './cli.js';
import { TermdotsError } from './errors.js';

runCli(process.argv).catch(async (error: unknown) => {
  if (error instanceof TermdotsError) {
    console.error(`Error: ${error.message}`);
  } else {
    Sentry.captureException(error);
    await Sentry.flush(2000);
    console.error('Error:', error);
  }
  process.exit(1);
});
