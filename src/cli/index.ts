#!/usr/bin/env node

import 'dotenv/config';
import { run } from './program.js';

process.exitCode = await run(process.argv);
