#!/usr/bin/env node
import "dotenv/config";
import { DEFAULT_TENANT } from "../lib/env";
import { HELP, hasWork, parseCliArgs } from "../lib/cli";
import { defaultDeps, runGuessCourseDates } from "../orchestrator/guessDates";

/**
 * 推定値から未設定のコース開始日・終了日を埋める（--update なしは通知のみ）。
 * 戻り値は終了コード。
 */
export async function main(argv: string[], out: (s: string) => void = (s) => process.stdout.write(s)): Promise<number> {
  const { help, options, tenant, unrecognized } = parseCliArgs(argv);

  // 不明なオプションは警告だけして続行
  if (unrecognized.length) console.error(`[guess] unrecognised options: ${unrecognized.join(" ")}`);
  if (help || !hasWork(options)) {
    out(HELP);
    return 0;
  }

  const t = tenant || DEFAULT_TENANT;
  await runGuessCourseDates(options, { ...defaultDeps(t), print: (s) => out(s + "\n") });
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((err) => { console.error(err); process.exit(1); });
}
