#!/usr/bin/env tsx
import { run } from './run.js'

process.exitCode = await run(process.argv)
