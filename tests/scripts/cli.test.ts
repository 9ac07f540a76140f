import test from "node:test";
import assert from "node:assert/strict";
import {
  parseArgs,
  parseIntegerValue,
  parseStringValue,
  rejectUnknownFlags,
} from "../../scripts/cli";

test("parseArgs reads long flags, inline values and short booleans", () => {
  const parsed = parseArgs(
    ["--total", "10", "--verbose", "--round=9", "-v", "extra", "--", "--raw"],
    { shortBooleanFlags: ["v"] }
  );
  assert.deepEqual(parsed.flags, {
    total: "10",
    verbose: true,
    round: "9",
    v: true,
  });
  assert.deepEqual(parsed.positional, ["extra", "--raw"]);
});

test("parseArgs keeps unknown short flags positional", () => {
  assert.deepEqual(parseArgs(["-x"]).positional, ["-x"]);
});

test("parseIntegerValue applies defaults and bounds", () => {
  assert.equal(parseIntegerValue(undefined, 6, "total"), 6);
  assert.equal(parseIntegerValue("12", 6, "total", 0), 12);
  assert.throws(() => parseIntegerValue(true, 6, "total"), /Missing value for --total/);
  assert.throws(() => parseIntegerValue("1.5", 6, "total"), /Invalid value for --total: 1.5/);
  assert.throws(() => parseIntegerValue("0", 1, "workers", 1), /--workers must be >= 1/);
});

test("parseStringValue requires a value when the flag is present", () => {
  assert.equal(parseStringValue(undefined, "round"), undefined);
  assert.equal(parseStringValue("9", "round"), "9");
  assert.throws(() => parseStringValue(true, "round"), /Missing value for --round/);
});

test("rejectUnknownFlags lists every unknown flag", () => {
  assert.doesNotThrow(() => rejectUnknownFlags({ total: "1" }, ["total"]));
  assert.throws(
    () => rejectUnknownFlags({ total: "1", x: true, y: "2" }, ["total"]),
    /Unknown option\(s\): --x, --y/
  );
});
