#!/usr/bin/env tsx
import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { createServices } from '@/lib/services';
import { createProgram } from './program';

const program = createProgram(() => createServices(loadConfig()));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('CLI error:', error);
  process.exitCode = 1;
});
