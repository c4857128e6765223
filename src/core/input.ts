import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./config";

export type ButtonState = {
  /** Held this frame. */
  down: boolean;
  /** Went down this frame. */
  pressed: boolean;
  /** Went up this frame. */
  released: boolean;
};

export const BUTTON_NAMES = ["btnA", "btnB", "btnStart", "btnSelect"] as const;
export type ButtonName = (typeof BUTTON_NAMES)[number];

export const FLICK_NAMES = ["jsUp", "jsDown", "jsLeft", "jsRight"] as const;
export type FlickName = (typeof FLICK_NAMES)[number];

/** Everything the simulation reads from the player in one frame. */
export type InputState = Record<ButtonName | FlickName, ButtonState> & {
  /** Joystick readings in [-2048, 2047]; positive y is up. */
  jsX: number;
  jsY: number;
};

export type JoystickReading = {
  jsX: number;
  jsY: number;
};

export type RawInput = JoystickReading & {
  buttons: Partial<Record<ButtonName, ButtonState>>;
};

export type FlickThresholds = Pick<EngineConfig, "flickThreshold" | "deadZone">;

export const idleButton = (): ButtonState => ({ down: false, pressed: false, released: false });

export const pressedButton = (): ButtonState => ({ down: true, pressed: true, released: false });

export const releasedButton = (): ButtonState => ({ down: false, pressed: false, released: true });

export const heldButton = (): ButtonState => ({ down: true, pressed: false, released: false });

export const createInputState = (overrides: Partial<InputState> = {}): InputState => ({
  jsX: 0,
  jsY: 0,
  jsUp: idleButton(),
  jsDown: idleButton(),
  jsLeft: idleButton(),
  jsRight: idleButton(),
  btnA: idleButton(),
  btnB: idleButton(),
  btnStart: idleButton(),
  btnSelect: idleButton(),
  ...overrides,
});

type FlickAxis = {
  name: FlickName;
  inFlick: boolean;
  inDeadZone: boolean;
};

const resolveFlick = ({ inFlick, inDeadZone }: FlickAxis, previous: ButtonState): ButtonState => {
  if (previous.down) {
    return inDeadZone ? releasedButton() : heldButton();
  }

  return inFlick ? pressedButton() : idleButton();
};

/**
 * Turns joystick readings into flick buttons. A flick starts when an axis
 * passes the flick threshold and stays held until the stick returns inside
 * the dead zone, so one push produces exactly one press.
 */
export const deriveFlicks = (
  reading: JoystickReading,
  previous: Pick<InputState, FlickName>,
  thresholds: FlickThresholds = DEFAULT_ENGINE_CONFIG,
): Record<FlickName, ButtonState> => {
  const { jsX, jsY } = reading;
  const { flickThreshold, deadZone } = thresholds;

  const axes: FlickAxis[] = [
    { name: "jsUp", inFlick: jsY > flickThreshold, inDeadZone: jsY < deadZone },
    { name: "jsDown", inFlick: jsY < -flickThreshold, inDeadZone: jsY > -deadZone },
    { name: "jsRight", inFlick: jsX > flickThreshold, inDeadZone: jsX < deadZone },
    { name: "jsLeft", inFlick: jsX < -flickThreshold, inDeadZone: jsX > -deadZone },
  ];

  const flicks = {
    jsUp: idleButton(),
    jsDown: idleButton(),
    jsLeft: idleButton(),
    jsRight: idleButton(),
  };
  for (const axis of axes) {
    flicks[axis.name] = resolveFlick(axis, previous[axis.name]);
  }
  return flicks;
};

export const composeInputState = (
  raw: RawInput,
  previous: InputState,
  thresholds: FlickThresholds = DEFAULT_ENGINE_CONFIG,
): InputState => {
  const input = createInputState({ jsX: raw.jsX, jsY: raw.jsY });
  for (const name of BUTTON_NAMES) {
    input[name] = { ...(raw.buttons[name] ?? idleButton()) };
  }
  return {
    ...input,
    ...deriveFlicks(raw, previous, thresholds),
  };
};
