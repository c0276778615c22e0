#!/usr/bin/env node
import { errorMessage } from "../errors";
import { createProgram } from "./commands";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });
