#!/usr/bin/env -S node --import tsx
import { hideBin } from "yargs/helpers"
import { run } from "../src/run"

process.exitCode = await run(hideBin(process.argv))
