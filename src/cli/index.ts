#!/usr/bin/env node

import type Database from 'better-sqlite3';
import type { AppServices } from '../main/providers/setup';
import { errorMessage } from '../shared/errors';
import { openDatabase } from './db';
import { createProgram } from './program';

let _services: AppServices | null = null;
let _db: Database.Database | null = null;

const program = createProgram(() => {
  if (!_services) {
    const opts = program.opts<{ db?: string }>();
    const result = openDatabase(opts.db);
    _db = result.db;
    _services = result.services;
  }
  return _services;
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
}).finally(() => {
  _db?.close();
});
