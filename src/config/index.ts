import * as dotenv from "dotenv";
import * as path from "path";
import { ConfigError } from "../shared/errors";

dotenv.config();

/**
 * Неотрицательное целое из переменной окружения
 */
export function readIntEnv(_name: string, _fallback: number, _env: NodeJS.ProcessEnv = process.env): number {
  const raw = _env[_name];
  if (raw === undefined || raw.trim() === "") {
    return _fallback;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${_name} должен быть неотрицательным целым числом, получено "${raw}"`);
  }
  return value;
}

/**
 * Разбивает командную строку клиента на исполняемый файл и аргументы (с учетом кавычек)
 */
export function parseCommandLine(_raw: string): { executable: string; args: string[] } {
  const tokens = _raw.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) ?? [];
  const cleaned = tokens.map((token) => token.replace(/^['"]|['"]$/g, ""));
  const [executable = "", ...args] = cleaned;
  return { executable, args };
}

export function loadConfig(_env: NodeJS.ProcessEnv = process.env) {
  const dataDir = path.resolve(_env.CHECKER_DATA_DIR || "./data");
  const client = parseCommandLine(_env.VPN_CLIENT_COMMAND || "mullvad");

  if (!client.executable) {
    throw new ConfigError("VPN_CLIENT_COMMAND не может быть пустым");
  }

  return {
    paths: {
      dataDir,
      inputFile: path.resolve(_env.CHECKER_INPUT_FILE || path.join(dataDir, "accounts_in.txt")),
      validFile: path.resolve(_env.CHECKER_VALID_FILE || path.join(dataDir, "accounts_working.txt")),
      deviceLimitFile: path.resolve(_env.CHECKER_DEVICE_LIMIT_FILE || path.join(dataDir, "accounts_max_devices.txt")),
    },
    client,
    pacing: {
      preCheckDelayMs: readIntEnv("CHECK_DELAY_MS", 2000, _env),
      postCheckDelayMs: readIntEnv("CHECK_COOLDOWN_MS", 1000, _env),
    },
    commandTimeoutMs: readIntEnv("COMMAND_TIMEOUT_MS", 0, _env),
    proxy: {
      raw: _env.PROXY || "",
      kind: _env.PROXY_TYPE || "",
      checkFirst: _env.PROXY_PREFLIGHT === "true",
    },
    dryRun: _env.CHECKER_DRY_RUN === "true",
    reportFile: _env.CHECKER_REPORT_FILE || undefined,
  };
}

export type CheckerConfig = ReturnType<typeof loadConfig>;
