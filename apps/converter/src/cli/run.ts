#!/usr/bin/env tsx
import { main } from "./main"

process.exitCode = await main({ argv: process.argv.slice(2) })
