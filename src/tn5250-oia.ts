import EventEmitter from 'events';
import { InputInhibited, OIAChange } from './common/enums';
import { Logger } from './logger';
import type { Logger as ILogger, OIAListener } from './types';

const CHANGE_EVENT = 'change';

const INPUT_ERRORS: readonly InputInhibited[] = [
  InputInhibited.COMM_CHECK,
  InputInhibited.PROG_CHECK,
  InputInhibited.MACHINE_CHECK,
  InputInhibited.OTHER,
];

/**
 * Operator information area: keyboard lock, input inhibition, message light
 * and the other status indicators of a session. Listeners are told about a
 * change only when a value actually changes; the bell and clear-screen
 * signals always notify.
 */
export class TN5250OIA {
  private logger: ILogger;
  private emitter = new EventEmitter();
  private keyboardLocked = false;
  private inputInhibited = InputInhibited.NOT_INHIBITED;
  private inhibitedText: string | undefined;
  private commCheckCode = 0;
  private progCheckCode = 0;
  private machineCheckCode = 0;
  private messageLightOn = false;
  private insertMode = false;
  private keysBuffered = false;
  private scriptActive = false;
  private owner = 0;
  private lastChange: OIAChange | undefined;

  constructor(logger?: ILogger) {
    this.logger = logger ?? new Logger(TN5250OIA.name);
    this.emitter.setMaxListeners(0);
  }

  public addOIAListener(listener: OIAListener<TN5250OIA>): void {
    this.emitter.on(CHANGE_EVENT, listener);
  }

  public removeOIAListener(listener: OIAListener<TN5250OIA>): void {
    this.emitter.off(CHANGE_EVENT, listener);
  }

  public isKeyBoardLocked(): boolean {
    return this.keyboardLocked;
  }

  public setKeyboardLocked(locked: boolean): void {
    if (this.keyboardLocked === locked) return;

    this.keyboardLocked = locked;
    this.fireOIAChanged(OIAChange.KEYBOARD_LOCKED);
  }

  public getInputInhibited(): InputInhibited {
    return this.inputInhibited;
  }

  public getInhibitedText(): string | undefined {
    return this.inhibitedText;
  }

  public getCommCheckCode(): number {
    return this.commCheckCode;
  }

  public getProgCheckCode(): number {
    return this.progCheckCode;
  }

  public getMachineCheckCode(): number {
    return this.machineCheckCode;
  }

  public isInputError(): boolean {
    return INPUT_ERRORS.includes(this.inputInhibited);
  }

  /**
   * Records why input is inhibited. The message is kept verbatim; `whatCode`
   * is stored as the check code for communication, program and machine
   * checks.
   */
  public setInputInhibited(
    inhibit: InputInhibited,
    whatCode = 0,
    message?: string
  ): void {
    if (
      inhibit === this.inputInhibited &&
      message === this.inhibitedText &&
      (this.checkCodeFor(inhibit) ?? whatCode) === whatCode
    )
      return;

    this.inputInhibited = inhibit;
    this.inhibitedText = message;

    switch (inhibit) {
      case InputInhibited.COMM_CHECK:
        this.commCheckCode = whatCode;
        break;
      case InputInhibited.PROG_CHECK:
        this.progCheckCode = whatCode;
        break;
      case InputInhibited.MACHINE_CHECK:
        this.machineCheckCode = whatCode;
        break;
      default:
        break;
    }

    this.fireOIAChanged(OIAChange.INPUT_INHIBITED);
  }

  /**
   * Drops an error inhibition (communication, program, machine or other
   * check). A system wait is left alone.
   */
  public clearInputError(): boolean {
    if (!this.isInputError()) return false;

    this.setInputInhibited(InputInhibited.NOT_INHIBITED);

    return true;
  }

  public isMessageWait(): boolean {
    return this.messageLightOn;
  }

  public setMessageLightOn(): void {
    this.setMessageLight(true);
  }

  public setMessageLightOff(): void {
    this.setMessageLight(false);
  }

  public isInsertMode(): boolean {
    return this.insertMode;
  }

  public setInsertMode(insertMode: boolean): void {
    if (this.insertMode === insertMode) return;

    this.insertMode = insertMode;
    this.fireOIAChanged(OIAChange.INSERT_MODE);
  }

  public isKeysBuffered(): boolean {
    return this.keysBuffered;
  }

  public setKeysBuffered(keysBuffered: boolean): void {
    if (this.keysBuffered === keysBuffered) return;

    this.keysBuffered = keysBuffered;
    this.fireOIAChanged(OIAChange.KEYS_BUFFERED);
  }

  public isScriptActive(): boolean {
    return this.scriptActive;
  }

  public setScriptActive(active: boolean): void {
    if (this.scriptActive === active) return;

    this.scriptActive = active;
    this.fireOIAChanged(OIAChange.SCRIPT);
  }

  public setAudibleBell(): void {
    this.fireOIAChanged(OIAChange.BELL);
  }

  public clearScreen(): void {
    this.fireOIAChanged(OIAChange.CLEAR_SCREEN);
  }

  public getOwner(): number {
    return this.owner;
  }

  public setOwner(owner: number): void {
    this.owner = owner;
  }

  public getLastChange(): OIAChange | undefined {
    return this.lastChange;
  }

  private setMessageLight(on: boolean): void {
    if (this.messageLightOn === on) return;

    this.messageLightOn = on;
    this.fireOIAChanged(OIAChange.MESSAGE_LIGHT);
  }

  private checkCodeFor(inhibit: InputInhibited): number | undefined {
    switch (inhibit) {
      case InputInhibited.COMM_CHECK:
        return this.commCheckCode;
      case InputInhibited.PROG_CHECK:
        return this.progCheckCode;
      case InputInhibited.MACHINE_CHECK:
        return this.machineCheckCode;
      default:
        return undefined;
    }
  }

  private fireOIAChanged(change: OIAChange): void {
    this.lastChange = change;

    this.logger.debug(`OIA changed: ${change}`);

    this.emitter.emit(CHANGE_EVENT, this, change);
  }
}
