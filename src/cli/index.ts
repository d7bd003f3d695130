#!/usr/bin/env node
import { Command } from "commander";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join, resolve, dirname } from "node:path";
import { analyze_document, describe_rules } from "../analyzer";
import { compose_match } from "../composer";
import { auto_runner } from "../engine/auto_runner";
import { random_strategy } from "../engine/strategies";
import { snapshot_match } from "../engine/snapshot";
import { PRESETS, PRESET_NAMES, is_preset_name } from "../presets";

/** 生成一个“写入器”：接收字符串和文件名，落到 baseDir 下；若是 JSON 字符串则按 spaces 缩进 */
export function create_folder_writer(baseDir: string, spaces = 2) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });

    // 合法 JSON → 统一格式化；否则原样写入；都保证末尾换行
    let text: string;
    try {
      const parsed: unknown = JSON.parse(content);
      text = JSON.stringify(parsed, null, spaces);
    } catch {
      text = content;
    }
    if (!text.endsWith("\n")) text += "\n";

    await writeFile(target, text, "utf8");
    return target;
  };
}

type CliOptions = {
  preset?: string;
  players?: string;
  seed?: string;
  episodes?: string;
  maxSteps?: string;
  pretty?: string | boolean;
  minify?: boolean;
};

export function to_pretty_spaces(opt: Pick<CliOptions, "pretty" | "minify">): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

/** 非负整数参数；缺省返回 fallback，非法返回 null */
export function to_int(raw: string | undefined, fallback: number | undefined): number | undefined | null {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

function error_message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function is_not_found(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function load_rules(baseDir: string, preset: string | undefined): Promise<unknown> {
  if (preset !== undefined) {
    if (!is_preset_name(preset)) {
      throw new Error(`unknown preset '${preset}' (expected one of: ${PRESET_NAMES.join(", ")})`);
    }
    console.log(`Using preset: ${preset}`);
    return PRESETS[preset];
  }
  const rulesPath = join(baseDir, "rules.json");
  const content = await readFile(rulesPath, "utf8");
  console.log(`Reading rules: ${rulesPath}`);
  return JSON.parse(content);
}

const program = new Command();

program
  .name("hybrid-board")
  .description("Analyze a board-game rule document, build a match and optionally simulate it")
  .version("0.1.0")
  .argument("[folder]", "folder containing rules.json; outputs are written here", ".")
  .option("--preset <name>", `use a built-in rule preset (${PRESET_NAMES.join(", ")})`)
  .option("--players <n>", "player count (clamped to the rule bounds)")
  .option("--seed <n>", "match seed", "0")
  .option("--episodes <n>", "number of self-play episodes to simulate", "0")
  .option("--max-steps <n>", "step limit per simulated episode", "200")
  .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)", false)
  .option("--minify", "minify JSON (overrides --pretty)", false)
  .action(async (folder: string, opts: CliOptions) => {
    const spaces = to_pretty_spaces(opts);
    const baseDir = resolve(folder);
    const players = to_int(opts.players, undefined);
    const seed = to_int(opts.seed, 0);
    const episodes = to_int(opts.episodes, 0);
    const max_steps = to_int(opts.maxSteps, 200);
    if (players === null || seed === null || episodes === null || max_steps === null) {
      console.error("❌ --players, --seed, --episodes and --max-steps take non-negative integers");
      process.exitCode = 1;
      return;
    }

    try {
      let rules: unknown;
      try {
        rules = await load_rules(baseDir, opts.preset);
      } catch (e) {
        if (is_not_found(e)) throw e;
        console.error(`❌ Invalid rules: ${error_message(e)}`);
        process.exitCode = 1;
        return;
      }
      const write = create_folder_writer(baseDir, spaces);

      /***
       * 步骤: Analyze
       * *****
       */
      const analyzed = analyze_document(rules);
      await write(JSON.stringify(analyzed, null, spaces), "analysis.out.json");
      if (!analyzed.ok) {
        console.error(`❌ Rules rejected with ${analyzed.errors.length} error(s):`);
        for (const e of analyzed.errors) {
          console.error(`  - [${e.code}] ${e.path} : ${e.message}`);
        }
        process.exitCode = 1;
        return;
      }
      for (const line of describe_rules(analyzed.rules)) console.log(`  ${line}`);

      /***
       * 步骤: Compose
       * *****
       */
      const composed = compose_match({ rules: analyzed.rules, players, seed });
      if (!composed.ok) {
        console.error(`❌ Match construction failed with ${composed.errors.length} error(s):`);
        for (const e of composed.errors) {
          console.error(`  - [${e.code}] ${e.path} : ${e.message}`);
        }
        process.exitCode = 1;
        return;
      }
      const match_target = await write(JSON.stringify(snapshot_match(composed.match), null, spaces), "match.out.json");
      console.log(`✅ Match written to: ${match_target}`);

      /***
       * 步骤: Simulate
       * *****
       */
      if (episodes && episodes > 0) {
        const summary = auto_runner({
          rules: analyzed.rules,
          players,
          episodes,
          max_steps,
          seed,
          strategies: Array.from({ length: composed.match.roster.size }, () => random_strategy),
        });
        const sim_target = await write(JSON.stringify(summary, null, spaces), "simulate.out.json");
        console.log(`✅ ${summary.finished}/${summary.episodes} episode(s) finished; summary written to: ${sim_target}`);
      }
    } catch (err) {
      if (is_not_found(err)) {
        console.error(`❌ Not found: ${join(baseDir, "rules.json")}`);
      } else {
        console.error(`💥 Unexpected error: ${error_message(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${error_message(err)}`);
  process.exitCode = 1;
});
