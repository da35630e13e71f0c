#!/usr/bin/env node
/**
 * @file packages/program/src/cli.ts
 * @version 0.1.0
 * @scope Program package source code.
 * @description Command-line entry point. Takes no arguments.
 */

import { main } from "./main.js";

main();
