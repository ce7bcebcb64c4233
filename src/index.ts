#!/usr/bin/env node
import prompts from "prompts";
import { loadConfig } from "./config";
import { Logger } from "./shared/utils/logger";
import { PROXY_KINDS, ProxyConfig } from "./shared/utils/proxyParser";
import { fileExists, formatDateForFilename, loadAccountsFromFile } from "./shared/utils/helpers";
import { getErrorMessage } from "./shared/errors";
import { CheckSessionService } from "./app/checkSession";
import * as path from "path";

const onCancel = () => {
  throw new Error("Операция отменена пользователем");
};

function asString(_value: unknown, _fallback: string = ""): string {
  return typeof _value === "string" ? _value : _fallback;
}

async function main() {
  const config = loadConfig();

  console.log("\n=== Проверка VPN аккаунтов ===\n");
  console.log("ℹ️  Без вопросов (настройки из .env): npm run check");
  console.log("ℹ️  Проверка прокси: npm run test:proxy\n");

  const fileResponse = await prompts(
    {
      type: "text",
      name: "inputFile",
      message: "Файл со списком аккаунтов (по одному в строке):",
      initial: config.paths.inputFile,
      validate: async (value: string) => ((await fileExists(value.trim())) ? true : "Файл не найден"),
    },
    { onCancel }
  );

  const inputFile = asString(fileResponse.inputFile).trim();
  const accounts = await loadAccountsFromFile(inputFile);
  Logger.info(`Загружено ${accounts.length} аккаунтов из ${inputFile}`);

  if (accounts.length === 0) {
    Logger.warn("Сначала добавьте аккаунты в файл");
    return;
  }

  const proxy = await askProxySettings(config.proxy.raw, config.proxy.kind);

  const delayResponse = await prompts(
    {
      type: "number",
      name: "delaySeconds",
      message: "Задержка перед каждой проверкой (секунды, 0-60):",
      initial: Math.round(config.pacing.preCheckDelayMs / 1000),
      min: 0,
      max: 60,
    },
    { onCancel }
  );
  const delaySeconds = typeof delayResponse.delaySeconds === "number" ? delayResponse.delaySeconds : 2;

  const reportResponse = await prompts(
    [
      {
        type: "confirm",
        name: "saveReport",
        message: "Сохранить отчет после проверки?",
        initial: true,
      },
      {
        type: (prev: boolean) => (prev ? "text" : null),
        name: "reportFile",
        message: "Файл отчета:",
        initial: path.join(config.paths.dataDir, `report-${formatDateForFilename()}.txt`),
      },
    ],
    { onCancel }
  );

  const session = new CheckSessionService();
  await session.runAsync({
    accounts,
    paths: config.paths,
    proxy,
    pacing: { ...config.pacing, preCheckDelayMs: delaySeconds * 1000 },
    client: config.client,
    commandTimeoutMs: config.commandTimeoutMs,
    dryRun: config.dryRun,
    checkProxyFirst: Boolean(proxy),
    reportFile: reportResponse.saveReport ? asString(reportResponse.reportFile) || undefined : undefined,
    handleSignals: true,
  });
}

/**
 * Настройки прокси: тип + Domain:Port:Username:Password
 */
async function askProxySettings(_raw: string, _kind: string): Promise<ProxyConfig | null> {
  const kindIndex = PROXY_KINDS.findIndex((kind) => kind === _kind.trim().toLowerCase());

  const typeResponse = await prompts(
    [
      {
        type: "confirm",
        name: "useProxy",
        message: "Использовать прокси?",
        initial: Boolean(_raw),
      },
      {
        type: (prev: boolean) => (prev ? "select" : null),
        name: "kind",
        message: "Тип прокси:",
        choices: PROXY_KINDS.map((kind) => ({ title: kind.toUpperCase(), value: kind })),
        initial: kindIndex >= 0 ? kindIndex : PROXY_KINDS.indexOf("socks5"),
      },
    ],
    { onCancel }
  );

  if (!typeResponse.useProxy) {
    return null;
  }

  const kind = asString(typeResponse.kind, "socks5");
  const proxyResponse = await prompts(
    {
      type: "text",
      name: "raw",
      message: "Прокси (Domain:Port:Username:Password):",
      initial: _raw,
      validate: (value: string) => {
        try {
          return ProxyConfig.parse(value, kind) ? true : "Укажите прокси";
        } catch (error) {
          return getErrorMessage(error);
        }
      },
    },
    { onCancel }
  );

  return ProxyConfig.parse(asString(proxyResponse.raw), kind);
}

main().catch((error) => {
  console.error("\nПроизошла ошибка:", getErrorMessage(error));
  process.exitCode = 1;
});
