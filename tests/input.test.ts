import { describe, expect, it } from 'vitest';

import {
  composeInputState,
  createInputState,
  deriveFlicks,
  heldButton,
  idleButton,
  pressedButton,
  releasedButton,
  type InputState,
} from '../src/core/input';

const flicksAfter = (readings: Array<[number, number]>): InputState[] => {
  const states: InputState[] = [];
  let previous = createInputState();
  for (const [jsX, jsY] of readings) {
    previous = { ...previous, jsX, jsY, ...deriveFlicks({ jsX, jsY }, previous) };
    states.push(previous);
  }
  return states;
};

describe('deriveFlicks', () => {
  it('presses once when the stick passes the threshold and releases inside the dead zone', () => {
    const [push, hold, ease, back] = flicksAfter([
      [0, 1600],
      [0, 2000],
      [0, 1000],
      [0, 100],
    ]);

    expect(push.jsUp).toEqual(pressedButton());
    expect(hold.jsUp).toEqual(heldButton());
    expect(ease.jsUp).toEqual(heldButton());
    expect(back.jsUp).toEqual(releasedButton());
  });

  it('needs the stick strictly past the threshold', () => {
    const [atThreshold] = flicksAfter([[0, 1536]]);
    expect(atThreshold.jsUp).toEqual(idleButton());
  });

  it('maps negative y to down and the x axis to left and right', () => {
    const [down, left, right] = flicksAfter([
      [0, -2048],
      [-2048, 0],
      [2047, 0],
    ]);

    expect(down.jsDown).toEqual(pressedButton());
    expect(down.jsUp).toEqual(idleButton());
    expect(left.jsDown).toEqual(releasedButton());
    expect(left.jsLeft).toEqual(pressedButton());
    expect(right.jsLeft).toEqual(releasedButton());
    expect(right.jsRight).toEqual(pressedButton());
  });

  it('does not press again without first returning to the dead zone', () => {
    const states = flicksAfter([
      [0, -2000],
      [0, -600],
      [0, -2000],
      [0, -400],
      [0, -2000],
    ]);

    expect(states.map((state) => state.jsDown.pressed)).toEqual([true, false, false, false, true]);
    expect(states.map((state) => state.jsDown.released)).toEqual([false, false, false, true, false]);
  });

  it('honours custom thresholds', () => {
    const flicks = deriveFlicks({ jsX: 900, jsY: 0 }, createInputState(), { flickThreshold: 800, deadZone: 200 });
    expect(flicks.jsRight).toEqual(pressedButton());
  });
});

describe('composeInputState', () => {
  it('copies the buttons it is given and fills the rest as idle', () => {
    const raw = { jsX: 0, jsY: 0, buttons: { btnA: pressedButton() } };
    const input = composeInputState(raw, createInputState());

    expect(input.btnA).toEqual(pressedButton());
    expect(input.btnA).not.toBe(raw.buttons.btnA);
    expect(input.btnB).toEqual(idleButton());
    expect(input.btnStart).toEqual(idleButton());
  });

  it('derives flicks from the joystick reading and the previous frame', () => {
    const first = composeInputState({ jsX: 1800, jsY: 0, buttons: {} }, createInputState());
    const second = composeInputState({ jsX: 1800, jsY: 0, buttons: {} }, first);

    expect(first.jsX).toBe(1800);
    expect(first.jsRight).toEqual(pressedButton());
    expect(second.jsRight).toEqual(heldButton());
  });
});
