#!/usr/bin/env tsx
/**
 * @fileoverview ml-check - Main Entry Point
 *
 * Checks the public kernel-team mailing list for patches that have not
 * been sufficiently reviewed. Classification is best-effort: messages
 * are judged by subject, Message-Id and body, then corrected using the
 * thread they belong to.
 *
 * Bygone months of the archive are downloaded once and cached; the
 * current month is downloaded on every run. The archive publishes new
 * mail with a delay, so a review sent a moment ago may not show yet.
 *
 * @module ml-check
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { run } from "./cli.js";

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL]", error);
        process.exitCode = 1;
    });
