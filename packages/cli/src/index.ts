#!/usr/bin/env tsx
/**
 * @sandbox-mirror/cli
 *
 * Usage: sandbox-mirror <minlon,minlat,maxlon,maxlat> --auth [--overpass <url>]
 */

import { main } from "./program.js";

process.exitCode = await main(process.argv);
