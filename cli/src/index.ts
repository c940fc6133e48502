#!/usr/bin/env node

/**
 * Infinitode CLI — leaderboards and player profiles from the terminal.
 *
 * @module cli
 */

import { createProgram } from "./program.js";

// ── Parse and execute ───────────────────────────────────────
await createProgram().parseAsync();
