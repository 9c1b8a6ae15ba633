#!/usr/bin/env node
import 'dotenv/config';
import { cli } from './cli.js';

await cli.parseAsync(process.argv);
