#!/usr/bin/env node
import process from 'node:process';

import { createProcessCliIo, manifest, runReportCli } from './index.js';

const PROGRAM_VERSION = '0.1.0';

const io = createProcessCliIo({ process });

const exitCode = await runReportCli({
  programName: 'lintstat',
  version: PROGRAM_VERSION,
  description: manifest.summary,
  io,
});

if (process.argv.length <= 2) {
  io.writeOut(
    `${manifest.name} summarises analyzer diagnostics. ` +
      'Explore `lintstat report --help` to get started.\n',
  );
}

io.exit(exitCode);
