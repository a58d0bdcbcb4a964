import { cleanSequence, hasWork, parseBool, parseCliArgs } from "../cli";

describe("parseCliArgs", () => {
  test("defaults", () => {
    const r = parseCliArgs([]);
    expect(r.help).toBe(false);
    expect(r.unrecognized).toEqual([]);
    expect(r.tenant).toBeUndefined();
    expect(r.options).toEqual({ guessStart: true, guessEnd: true, guessAll: false, update: false, filter: null });
  });

  test("boolean flags take an optional value", () => {
    const r = parseCliArgs(["--update", "--guessstart=0", "--guessall=yes", "--guessend=false"]);
    expect(r.options).toMatchObject({ update: true, guessStart: false, guessAll: true, guessEnd: false });
  });

  test("filter and tenant", () => {
    const r = parseCliArgs(["--filter=123,321", "--tenant=acme"]);
    expect(r.options.filter).toEqual([123, 321]);
    expect(r.tenant).toBe("acme");
  });

  test("help in both forms", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });

  test("unknown options and a bare --filter are reported", () => {
    expect(parseCliArgs(["--nope", "stray", "--filter"]).unrecognized).toEqual(["--nope", "stray", "--filter"]);
  });
});

describe("helpers", () => {
  test("parseBool", () => {
    expect(parseBool(undefined)).toBe(true);
    expect(parseBool("1")).toBe(true);
    expect(parseBool("0")).toBe(false);
    expect(parseBool("Off")).toBe(false);
    expect(parseBool("")).toBe(false);
  });

  test("cleanSequence drops empty items and rejects anything but digits and commas", () => {
    expect(cleanSequence("4,,5,")).toEqual([4, 5]);
    expect(cleanSequence("4;5")).toEqual([]);
    expect(cleanSequence("")).toEqual([]);
  });

  test("hasWork is false only when all three guess flags are off", () => {
    const o = { guessStart: false, guessEnd: false, guessAll: false, update: true, filter: null };
    expect(hasWork(o)).toBe(false);
    expect(hasWork({ ...o, guessAll: true })).toBe(true);
  });
});
