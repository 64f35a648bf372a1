import { DefaultCorrelationWindowSeconds } from './parser/constants';

export interface ConsoleSettings {
  configPath: string;
  containerName: string;
  image: string;
  logLines: number;
  correlationWindowSeconds: number;
}

export const DefaultSettings: ConsoleSettings = {
  configPath: '/etc/proxlb/proxlb.yaml',
  containerName: 'proxlb',
  image: 'cr.gyptazy.com/proxlb/proxlb:latest',
  logLines: 100,
  correlationWindowSeconds: DefaultCorrelationWindowSeconds,
};

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const n = parseInt(value, 10);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Read application settings from the environment
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): ConsoleSettings {
  return {
    configPath: env.PROXLB_CONFIG || DefaultSettings.configPath,
    containerName: env.PROXLB_CONTAINER || DefaultSettings.containerName,
    image: env.PROXLB_IMAGE || DefaultSettings.image,
    logLines: positiveInt(env.PROXLB_LOG_LINES, DefaultSettings.logLines),
    correlationWindowSeconds: positiveInt(
      env.CORRELATION_WINDOW_SECONDS,
      DefaultSettings.correlationWindowSeconds,
    ),
  };
}
