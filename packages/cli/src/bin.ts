#!/usr/bin/env tsx
import { hideBin } from 'yargs/helpers'
import { runCli } from './index.js'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

// INIT_CWD is the directory npm was started from
const cwd = process.env.INIT_CWD || process.cwd()

process.exitCode = await runCli(
  hideBin(process.argv).filter((arg) => arg !== '--'),
  { cwd, signal: controller.signal }
)
