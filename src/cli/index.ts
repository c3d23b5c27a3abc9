#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
