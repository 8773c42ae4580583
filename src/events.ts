// Discrete events consumed by the browser session loop

export interface KeyEvent {
  /** Printable character, or a name such as `Enter`, `ArrowUp`, `F5` */
  key: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
}

export type EditAction =
  | { kind: 'insert'; text: string }
  | { kind: 'delete-back' }
  | { kind: 'delete-forward' }
  | { kind: 'left' }
  | { kind: 'right' }
  | { kind: 'home' }
  | { kind: 'end' }
  | { kind: 'newline' }
  | { kind: 'commit' }
  | { kind: 'cancel' };

export type BrowserEvent =
  | { type: 'scroll'; delta: number }
  | { type: 'page'; direction: 1 | -1 }
  | { type: 'home' }
  | { type: 'end' }
  | { type: 'focus'; direction: 1 | -1 }
  | { type: 'activate' }
  | { type: 'activate-new-tab' }
  | { type: 'navigate'; url: string }
  | { type: 'open-address' }
  | { type: 'back' }
  | { type: 'forward' }
  | { type: 'reload' }
  | { type: 'new-tab' }
  | { type: 'close-tab' }
  | { type: 'switch-tab'; direction: 1 | -1 }
  | { type: 'edit'; action: EditAction }
  | { type: 'resize'; width: number; height: number }
  | { type: 'toggle-images' }
  | { type: 'toggle-theme' }
  | { type: 'quit' };

export type BrowserEventType = BrowserEvent['type'];

export function createKeyEvent(key: string, modifiers: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return {
    key,
    ctrlKey: modifiers.ctrlKey ?? false,
    altKey: modifiers.altKey ?? false,
    shiftKey: modifiers.shiftKey ?? false,
  };
}
