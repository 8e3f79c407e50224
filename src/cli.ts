#!/usr/bin/env node
/**
 * tickwork CLI entry point
 */

import "dotenv/config";

import { runCli } from "./cli/cli-app.js";

void runCli();
