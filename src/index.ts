#!/usr/bin/env node

import dotenv from 'dotenv';
import { defaultDeps, run } from './cli.js';

// Values already set in the environment take precedence over .env
dotenv.config();

process.exitCode = await run(process.argv.slice(2), defaultDeps());
