#!/usr/bin/env node
import { main } from "./cli.js";

// stdout carries protocol replies only; diagnostics go to stderr
process.stdin.setEncoding("utf8");
process.exit(await main({ input: process.stdin }));
