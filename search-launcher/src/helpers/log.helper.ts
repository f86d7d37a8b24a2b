import fs from "fs";
import path from "path";
import chalk from "chalk";

function readVersion(): string {
  const pkgPath = path.resolve(__dirname, "../../package.json");
  if (!fs.existsSync(pkgPath)) return "0.0.0";
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const appVersion = readVersion();

export const logInfo = (message: string): void => {
  console.info(chalk.blue(message));
};

export const logSuccess = (message: string): void => {
  console.info(chalk.green(message));
};

export const logWarn = (message: string): void => {
  console.warn(chalk.yellow(message));
};

export const logError = (message: string): void => {
  const messageWithVersion = `${chalk.gray(`[v${appVersion}]`)} ${message}`;
  console.error(messageWithVersion);
};
