import { main } from "../guess_course_dates";
import { HELP } from "../../lib/cli";
import * as orchestrator from "../../orchestrator/guessDates";

describe("guess_course_dates main", () => {
  afterEach(() => jest.restoreAllMocks());

  test("-h prints help and exits 0 without touching the store", async () => {
    const run = jest.spyOn(orchestrator, "runGuessCourseDates");
    const out: string[] = [];
    expect(await main(["-h"], (s) => out.push(s))).toBe(0);
    expect(out).toEqual([HELP]);
    expect(run).not.toHaveBeenCalled();
  });

  test("nothing to guess prints help and exits 0", async () => {
    const out: string[] = [];
    expect(await main(["--guessstart=0", "--guessend=0"], (s) => out.push(s))).toBe(0);
    expect(out).toEqual([HELP]);
  });

  test("unknown options are reported on stderr and the batch still runs", async () => {
    const err = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const run = jest.spyOn(orchestrator, "runGuessCourseDates").mockResolvedValue([]);
    const out: string[] = [];
    expect(await main(["--update", "--verbose"], (s) => out.push(s))).toBe(0);
    expect(err).toHaveBeenCalledWith("[guess] unrecognised options: --verbose");
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0].update).toBe(true);
    expect(out).toEqual([]);
  });

  test("unknown options with -h still print help", async () => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    const out: string[] = [];
    expect(await main(["--bogus", "-h"], (s) => out.push(s))).toBe(0);
    expect(out).toEqual([HELP]);
  });

  test("runs the batch with the parsed options", async () => {
    const run = jest.spyOn(orchestrator, "runGuessCourseDates").mockResolvedValue([]);
    expect(await main(["--update", "--filter=7", "--tenant=t9"], () => undefined)).toBe(0);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toEqual({ guessStart: true, guessEnd: true, guessAll: false, update: true, filter: [7] });
  });
});
