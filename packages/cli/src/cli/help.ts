/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
semport - C++ to Java semantic mapping engine v${VERSION}

USAGE:
  semport <command> [files...] [options]

COMMANDS:
  map [files...]            Map source documents and write Java files
  check [files...]          Map and print diagnostics only
  report [files...]         Print the JSON mapping report to stdout

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Print the outcome of every type
  -q, --quiet               Suppress progress output
  -c, --config <file>       Config file path (default: semport.json)

MAP OPTIONS:
  -o, --out <dir>           Output directory for Java files
  -p, --root-package <pkg>  Package prefixed to every generated package
  -r, --report <file>       Also write the JSON report to <file>
  --release-method <name>   Name of the synthesized release method

EXIT CODES:
  0  Success
  1  Error diagnostics present
  2  Unknown command
  3  Configuration or input failure
  4  Fatal mapping failure (inheritance cycle)

EXAMPLES:
  semport map units/shapes.yaml -o java -p com.example
  semport check
  semport report units/*.yaml > report.json
`);
};
