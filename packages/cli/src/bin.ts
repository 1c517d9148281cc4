#!/usr/bin/env tsx
import { run } from './index'

process.exitCode = run(process.argv.slice(2))
