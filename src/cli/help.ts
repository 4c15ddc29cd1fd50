/**
 * Help text for gap-detect.
 */
export function formatHelp(): string {
  return `
gap-detect - Find gaps between values in subsequent lines of delimited text

Reads FILE (or standard input for -), extracts one field per line, parses
it as a number or timestamp, and reports each pair of consecutive valid
values whose difference satisfies the chosen comparison.

Usage:
  gap-detect [options] FILE

Options:
  -d, --delimiter=DELIM   Input delimiter, may be longer than one char (default: ",")
                          "\\t" means TAB; "" treats the whole line as field 1
  -i, --index=INDEX       1-based index of the field to evaluate (default: 1)
  -f, --format=FORMAT     Field format (default: uint)
                            uint      unsigned integer
                            int       signed integer
                            unix      seconds since the Unix epoch
                            unix_ms   milliseconds since the Unix epoch
                            rfc-3339  timestamp like yyyy-mm-ddTHH:MM:SSZ
  --gt=GAP                Report gaps greater than GAP (default comparison)
  --ge=GAP                Report gaps greater than or equal to GAP
  --lt=GAP                Report gaps less than GAP
  --le=GAP                Report gaps less than or equal to GAP
                          GAP is a signed integer for uint/int (default: 1), or a
                          signed integer plus one of d, h, m, s for time formats
                          (default: 1h)
  --allow-negative-gap    Accept negative time-based gaps such as -5m
  -c, --comment=MARKER    Skip lines starting with MARKER (default: "#"; "" disables)
  -a, --allow-empty       Skip empty and invalid lines instead of stopping
  -D, --diff[=DELIM]      Diff mode (default): one line per gap with both values,
                          joined by DELIM (default: the input delimiter);
                          also -D DELIM FILE, -DDELIM or -D=DELIM
  -F, --filter            Filter mode: print both offending lines unchanged,
                          with an empty line between pairs
  -v, --verbose           Print the resolved configuration before scanning
  --config=PATH           Read default options from a JSON file
  -h, --help              Show this help
  -V, --version           Show version

Exit codes:
  0  success
  1  a data line stopped the scan
  2  invalid options, gap, config file or input path
  3  read or write failure

Examples:
  gap-detect -i 2 --gt 4 results.csv
  gap-detect -f unix -d ';' --ge 15m readings.csv
  tail -n 1000 app.log | gap-detect -d ' ' -f rfc-3339 --gt 30s -F -
`;
}
