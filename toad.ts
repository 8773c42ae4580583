#!/usr/bin/env node
/**
 * # Toad
 *
 * A web browser for the terminal. Pages are fetched, parsed, styled and laid
 * out into character cells; links and forms are driven from the keyboard.
 *
 * ```bash
 * toad https://example.com
 * toad ./page.html
 * toad --dump --width 100 https://example.com > page.txt
 * ```
 *
 * Run `toad --help` for options and key bindings.
 *
 * @module
 */

import { run } from './src/toad-main.js';

run();
