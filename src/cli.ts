#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import {
  backups,
  fixChecksums,
  get,
  info,
  restore,
  search,
  set,
  unlock,
  validate
} from './commands'
import type { PackageJson } from './types'

const packageJson: PackageJson = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
)

cli({
  name: 'slotsmith',
  version: packageJson.version,
  commands: [
    info,
    validate,
    get,
    set,
    unlock,
    fixChecksums,
    backups,
    restore,
    search
  ],
  help: {
    description: packageJson.description
  }
})
