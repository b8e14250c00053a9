import type { JsonValue } from './index';

export type ObservabilityLevel = 'info' | 'warn' | 'error';

export interface ObservabilityContext {
  service: string;
  environment: string;
}

export type ObservabilityFields = Readonly<Record<string, JsonValue | undefined>>;

const writeLogLine = (
  level: ObservabilityLevel,
  context: ObservabilityContext,
  event: string,
  fields: ObservabilityFields,
): void => {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    service: context.service,
    environment: context.environment,
    event,
    ...fields,
  });

  switch (level) {
    case 'error':
      console.error(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'info':
      console.log(line);
      return;
  }
};

export const logInfo = (
  context: ObservabilityContext,
  event: string,
  fields: ObservabilityFields = {},
): void => {
  writeLogLine('info', context, event, fields);
};

export const logWarn = (
  context: ObservabilityContext,
  event: string,
  fields: ObservabilityFields = {},
): void => {
  writeLogLine('warn', context, event, fields);
};

export const logError = (
  context: ObservabilityContext,
  event: string,
  fields: ObservabilityFields = {},
): void => {
  writeLogLine('error', context, event, fields);
};
