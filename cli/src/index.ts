#!/usr/bin/env node

/**
 * Shelfkeep CLI — Entry Point
 *
 * Commands:
 *   shelf list                 List the catalog
 *   shelf search [query]       Search titles and authors
 *   shelf show <id>            Show one record
 *   shelf add <type>           Add a book, e-book or audiobook
 *   shelf remove <id>          Remove a record
 *   shelf import <file>        Add records from another file
 *   shelf export <file>        Write the catalog to another file
 *   shelf check [file]         Validate a catalog file
 */

import { createProgram } from "./program";
import { reportError } from "./output";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    reportError(err);
    process.exit(1);
  });
