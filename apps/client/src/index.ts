#!/usr/bin/env node
/**
 * GNTP CLI Client Entry Point
 */

import { GntpCLI } from "./cli.js";
import { DEFAULT_PORT } from "../../../packages/protocol/src/constants.js";

const host = process.argv[2] || "localhost";
const port = parseInt(process.argv[3] || String(DEFAULT_PORT), 10);

const cli = new GntpCLI(host, port);
cli.start();
