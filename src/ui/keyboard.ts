import { DEFAULT_ENGINE_CONFIG } from "../core/config";
import {
  BUTTON_NAMES,
  composeInputState,
  createInputState,
  type ButtonName,
  type ButtonState,
  type FlickThresholds,
  type InputState,
  type RawInput,
} from "../core/input";

export const JOYSTICK_MAX = 2047;
export const JOYSTICK_MIN = -2048;

type StickKey = "stickUp" | "stickDown" | "stickLeft" | "stickRight";

export type KeyBindings = Readonly<Record<ButtonName | StickKey, ReadonlyArray<string>>>;

/** `KeyboardEvent.code` values per control. */
export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  stickUp: ["ArrowUp", "KeyW"],
  stickDown: ["ArrowDown", "KeyS"],
  stickLeft: ["ArrowLeft", "KeyA"],
  stickRight: ["ArrowRight", "KeyD"],
  btnA: ["KeyZ", "Space"],
  btnB: ["KeyX", "Escape"],
  btnStart: ["Enter"],
  btnSelect: ["Tab"],
};

type KeyEventLike = {
  code: string;
  repeat: boolean;
  preventDefault: () => void;
};

export type KeyboardTarget = {
  addEventListener(type: "keydown" | "keyup" | "blur", listener: (event: Event) => void): void;
  removeEventListener(type: "keydown" | "keyup" | "blur", listener: (event: Event) => void): void;
};

export type AttachKeyboardArgs = {
  target: KeyboardTarget;
  bindings?: KeyBindings;
  thresholds?: FlickThresholds;
};

export type KeyboardController = {
  /** Input for one frame; key events since the previous sample are latched into it. */
  sample(): InputState;
  destroy(): void;
};

const toKeyEvent = (event: Event): KeyEventLike | null => {
  if (!("code" in event) || typeof event.code !== "string") {
    return null;
  }

  return {
    code: event.code,
    repeat: "repeat" in event && event.repeat === true,
    preventDefault: () => event.preventDefault(),
  };
};

export const attachKeyboard = ({
  target,
  bindings = DEFAULT_KEY_BINDINGS,
  thresholds = DEFAULT_ENGINE_CONFIG,
}: AttachKeyboardArgs): KeyboardController => {
  const held = new Set<string>();
  const pressedSinceSample = new Set<string>();
  const releasedSinceSample = new Set<string>();
  const boundCodes = new Set(Object.values(bindings).flat());
  let previous = createInputState();

  const handleKeyDown = (raw: Event): void => {
    const event = toKeyEvent(raw);
    if (event === null || !boundCodes.has(event.code)) {
      return;
    }

    event.preventDefault();
    if (event.repeat || held.has(event.code)) {
      return;
    }
    held.add(event.code);
    pressedSinceSample.add(event.code);
  };

  const handleKeyUp = (raw: Event): void => {
    const event = toKeyEvent(raw);
    if (event === null || !held.has(event.code)) {
      return;
    }

    held.delete(event.code);
    releasedSinceSample.add(event.code);
  };

  // Keys released while the window has no focus never fire keyup.
  const handleBlur = (): void => {
    for (const code of held) {
      releasedSinceSample.add(code);
    }
    held.clear();
  };

  const isActive = (codes: ReadonlyArray<string>): boolean =>
    codes.some((code) => held.has(code) || pressedSinceSample.has(code));

  const readButton = (codes: ReadonlyArray<string>): ButtonState => ({
    down: codes.some((code) => held.has(code)),
    pressed: codes.some((code) => pressedSinceSample.has(code)),
    released: codes.some((code) => releasedSinceSample.has(code)),
  });

  const readAxis = (positive: ReadonlyArray<string>, negative: ReadonlyArray<string>): number =>
    (isActive(positive) ? JOYSTICK_MAX : 0) + (isActive(negative) ? JOYSTICK_MIN : 0);

  const sample = (): InputState => {
    const buttons: Partial<Record<ButtonName, ButtonState>> = {};
    for (const name of BUTTON_NAMES) {
      buttons[name] = readButton(bindings[name]);
    }

    const raw: RawInput = {
      jsX: readAxis(bindings.stickRight, bindings.stickLeft),
      jsY: readAxis(bindings.stickUp, bindings.stickDown),
      buttons,
    };

    pressedSinceSample.clear();
    releasedSinceSample.clear();
    previous = composeInputState(raw, previous, thresholds);
    return previous;
  };

  target.addEventListener("keydown", handleKeyDown);
  target.addEventListener("keyup", handleKeyUp);
  target.addEventListener("blur", handleBlur);

  const destroy = (): void => {
    target.removeEventListener("keydown", handleKeyDown);
    target.removeEventListener("keyup", handleKeyUp);
    target.removeEventListener("blur", handleBlur);
    held.clear();
    pressedSinceSample.clear();
    releasedSinceSample.clear();
  };

  return {
    sample,
    destroy,
  };
};
