#!/usr/bin/env node

/**
 * debpack: build a .deb from the Python project in the current directory.
 *
 *   debpack              Clean deb_dist/ and run the stdeb build
 *   debpack --install    ...then `sudo dpkg -i` the package and `sudo apt-get install -f`
 */

import { createProgram } from "./program.js";

createProgram().parse();
