import {
  GlobalKeyboardListener,
  IGlobalKeyDownMap,
  IGlobalKeyEvent,
  IGlobalKeyListener
} from 'node-global-key-listener';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { ParsedHotkey, areModifiersHeld, parseHotkey } from './parseHotkey';

export interface HotkeyCallbacks {
  onPress: () => Promise<void> | void;
  onRelease: () => Promise<void> | void;
}

export class GlobalHotkey {
  private listener: GlobalKeyboardListener | undefined;
  private readonly parsedHotkey: ParsedHotkey;
  private readonly handler: IGlobalKeyListener;
  private active = false;

  public constructor(
    accelerator: string,
    private readonly callbacks: HotkeyCallbacks,
    private readonly logger?: StructuredLogger
  ) {
    this.parsedHotkey = parseHotkey(accelerator);

    this.handler = (event, down) => {
      return this.onKeyEvent(event, down);
    };
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.listener) {
      return;
    }

    const listener = new GlobalKeyboardListener();
    await listener.addListener(this.handler);
    this.listener = listener;
    this.logger?.info('Global hotkey listener started', {
      hotkey: this.describeBinding()
    });
  }

  public stop(): void {
    const listener = this.listener;
    if (!listener) {
      return;
    }

    listener.removeListener(this.handler);
    listener.kill();
    this.listener = undefined;
    this.active = false;

    this.logger?.info('Global hotkey listener stopped');
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    return this.handleKey(event.name, event.state, down);
  }

  /** Returns true while the combo is held, which tells the listener to swallow the key. */
  public handleKey(keyName: IGlobalKeyEvent['name'], state: IGlobalKeyEvent['state'], down: IGlobalKeyDownMap): boolean {
    if (!keyName) {
      return false;
    }

    const isTriggerKey = keyName === this.parsedHotkey.triggerKey;
    const modifiersHeld = areModifiersHeld(this.parsedHotkey, down);
    const comboHeld = modifiersHeld && Boolean(down[this.parsedHotkey.triggerKey]);

    if (state === 'DOWN' && isTriggerKey && modifiersHeld) {
      if (!this.active) {
        this.active = true;
        this.invokeSafely(this.callbacks.onPress, 'onPress');
      }

      return true;
    }

    if (this.active && ((state === 'UP' && isTriggerKey) || !comboHeld)) {
      this.active = false;
      this.invokeSafely(this.callbacks.onRelease, 'onRelease');
      return true;
    }

    return this.active;
  }

  private invokeSafely(fn: () => Promise<void> | void, action: 'onPress' | 'onRelease'): void {
    Promise.resolve()
      .then(fn)
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error(`Hotkey ${action} callback failed`, { detail });
      });
  }
}
