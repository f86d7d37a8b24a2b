#!/usr/bin/env node
import chalk from "chalk";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { WIKI_SENTENCES } from "./env";
import { CollaboratorError, errorMessage } from "./errors";
import { fetchSummary, type WikiClientOptions } from "./wikipedia";

export const WIKI_USAGE = `Usage:
  wiki-summary "Ada Lovelace"          # first ${WIKI_SENTENCES} sentences
  wiki-summary "Ada Lovelace" -s 3     # first 3 sentences
  wiki-summary                         # prompt for a topic`;

export type WikiArgs = {
  topic: string;
  sentences: number;
  help: boolean;
};

export function parseWikiArgs(argv: readonly string[], defaultSentences = WIKI_SENTENCES): WikiArgs {
  const args: WikiArgs = { topic: "", sentences: defaultSentences, help: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-s" || a === "--sentences") {
      const n = Number(argv[++i]);
      if (!Number.isInteger(n) || n < 1) throw new Error(`${a} needs a positive whole number`);
      args.sentences = n;
    } else if (a === "-h" || a === "--help") {
      args.help = true;
    } else {
      words.push(a);
    }
  }

  args.topic = words.join(" ").trim();
  return args;
}

async function askTopic(): Promise<string> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Enter a topic: ");
  rl.close();
  return ans.trim();
}

export async function runWiki(
  argv: string[],
  options: WikiClientOptions & { ask?: () => Promise<string> } = {}
): Promise<number> {
  let args: WikiArgs;
  try {
    args = parseWikiArgs(argv);
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    console.log(WIKI_USAGE);
    return 0;
  }

  if (args.help) {
    console.log(WIKI_USAGE);
    return 0;
  }

  const topic = args.topic || (await (options.ask ?? askTopic)());
  if (!topic) {
    console.log(chalk.yellow("Please enter a topic."));
    return 0;
  }

  try {
    const summary = await fetchSummary(topic, args.sentences, options);
    console.log(chalk.bold(`\n${summary.title}`));
    console.log(summary.text);
    console.log(chalk.gray(`\n${summary.url}`));
  } catch (err) {
    if (!(err instanceof CollaboratorError)) throw err;
    console.error(chalk.red(err.message));
  }
  return 0;
}

if (require.main === module) {
  runWiki(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((e) => {
      console.error("Error:", errorMessage(e));
      process.exit(1);
    });
}
