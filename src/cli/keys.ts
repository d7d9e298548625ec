export type KeyAction = "quit" | "refresh" | "next" | "previous";

const KEY_ACTIONS: Record<string, KeyAction> = {
  q: "quit",
  Q: "quit",
  "\u0003": "quit", // Ctrl-C in raw mode
  r: "refresh",
  R: "refresh",
  j: "next",
  "\u001b[B": "next", // down arrow
  k: "previous",
  "\u001b[A": "previous", // up arrow
};

/** Map raw terminal input to dashboard actions, in the order they were typed. */
export function keyActions(input: string): KeyAction[] {
  const whole = KEY_ACTIONS[input];
  if (whole) return [whole];

  const actions: KeyAction[] = [];
  for (const ch of input) {
    const action = KEY_ACTIONS[ch];
    if (action) actions.push(action);
  }
  return actions;
}
