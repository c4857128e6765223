export type EngineConfig = {
  /** Frames a requested state change waits before it takes effect. */
  transitionFrames: number;
  /** Frames the intro screen shows before moving on by itself. */
  introTimeoutFrames: number;
  /** Joystick deflection that starts a flick. */
  flickThreshold: number;
  /** Joystick deflection below which a held flick ends. */
  deadZone: number;
  /** World ticks per frame while fast-forwarding. */
  fastForwardTicks: number;
  logTransitions: boolean;
};

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  transitionFrames: 45,
  introTimeoutFrames: 120,
  flickThreshold: 1536,
  deadZone: 512,
  fastForwardTicks: 2,
  logTransitions: false,
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && !Array.isArray(value);
};

const getNonNegativeInteger = (value: unknown): number | null => {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : null;
};

const getPositiveInteger = (value: unknown): number | null => {
  const parsed = getNonNegativeInteger(value);
  return parsed === null || parsed === 0 ? null : parsed;
};

const getRecordBoolean = (value: unknown): boolean | null => {
  return typeof value === "boolean" ? value : null;
};

export const normalizeEngineConfig = (raw: unknown): EngineConfig => {
  const record = isRecord(raw) ? raw : null;

  return {
    transitionFrames: getNonNegativeInteger(record?.transitionFrames) ?? DEFAULT_ENGINE_CONFIG.transitionFrames,
    introTimeoutFrames: getPositiveInteger(record?.introTimeoutFrames) ?? DEFAULT_ENGINE_CONFIG.introTimeoutFrames,
    flickThreshold: getNonNegativeInteger(record?.flickThreshold) ?? DEFAULT_ENGINE_CONFIG.flickThreshold,
    deadZone: getNonNegativeInteger(record?.deadZone) ?? DEFAULT_ENGINE_CONFIG.deadZone,
    fastForwardTicks: getPositiveInteger(record?.fastForwardTicks) ?? DEFAULT_ENGINE_CONFIG.fastForwardTicks,
    logTransitions: getRecordBoolean(record?.logTransitions) ?? DEFAULT_ENGINE_CONFIG.logTransitions,
  };
};
