#!/usr/bin/env node
import { createCLI, toCliOptions } from "./cli.js"
import { runStrata } from "./run.js"

const program = createCLI()
program.parse()

process.exitCode = await runStrata(toCliOptions(program))
