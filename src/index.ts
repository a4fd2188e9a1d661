#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli.js";

/**
 * jsonsheet CLI Entry Point
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (default: info)
 * - NODE_ENV: "development" enables pretty logs
 * - SENTRY_DSN: Enables error reporting
 * - JSONSHEET_MAX_CELL_LENGTH, JSONSHEET_NOTE_PREVIEW_LENGTH,
 *   JSONSHEET_SHEET_NAME, JSONSHEET_NOTE_AUTHOR: conversion defaults
 */
runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  }
);
