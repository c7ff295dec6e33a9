#!/usr/bin/env node
import 'dotenv/config'
import { handle } from '@oclif/core'
import Roulette from './command.js'

async function main() {
  await Roulette.run(process.argv.slice(2), import.meta.url)
}

main().catch(handle)
