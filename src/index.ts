#!/usr/bin/env node

import { config as loadDotenv } from 'dotenv'

import { main } from './cli'

loadDotenv()

main(process.argv).then((exitCode) => {
  process.exit(exitCode)
})
