#!/usr/bin/env tsx
// apps/cli/src/index.ts
import fs from 'node:fs';
import pino from 'pino';
import { createLogger, loadConfig } from '@shadowsql/core';
import { createProposalSource } from '@shadowsql/llm';
import { MySqlShadowDatabase } from '@shadowsql/shadow-mysql';
import { runCli } from './cli';

const ctl = new AbortController();
process.once('SIGINT', () => ctl.abort());

runCli(process.argv.slice(2), {
  io: {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text)
  },
  loadConfig: (file) => loadConfig({ file }),
  // stdout carries the report; logs go to stderr
  createLogger: (cfg) => createLogger({ level: cfg.logging.level, name: 'shadowsql-cli' }, pino.destination(2)),
  openDatabase: (cfg, logger) =>
    new MySqlShadowDatabase({
      uri: cfg.shadow_database.uri,
      isolation: cfg.shadow_database.isolation,
      connectionLimit: cfg.shadow_database.connection_limit,
      logger
    }),
  openSource: (cfg, logger) => createProposalSource(cfg.llm, logger),
  readFile: (file) => fs.readFileSync(file, 'utf-8'),
  signal: ctl.signal
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error', err);
    process.exitCode = 1;
  });
