/**
 * In-memory service manager for testing
 *
 * Implements the ServiceController contract without spawning anything:
 * queries read per-unit state, mutations update it and are recorded, and
 * any call can be made to fail.
 */

import { ServiceCommandError } from '@unitfleet/core';
import type { ServiceController, ServiceScope } from '@unitfleet/apps';

export type ControllerCall =
  | {
      method: 'isActive' | 'isEnabled' | 'start' | 'stop' | 'followLogs';
      unit: string;
      scope: ServiceScope;
    }
  | { method: 'reload'; scope: ServiceScope };

export type ControllerMethod = ControllerCall['method'];

interface UnitState {
  active: boolean;
  enabled: boolean;
}

export class FakeServiceController implements ServiceController {
  readonly calls: ControllerCall[] = [];

  private readonly units = new Map<string, UnitState>();
  private readonly failures = new Set<ControllerMethod>();
  /** Whether start() also enables the unit */
  private readonly enableOnStart: boolean;

  constructor(options: { enableOnStart?: boolean } = {}) {
    this.enableOnStart = options.enableOnStart ?? false;
  }

  /**
   * Set the state a unit reports
   */
  setUnit(unit: string, state: Partial<UnitState>): this {
    this.units.set(unit, { ...this.getUnit(unit), ...state });
    return this;
  }

  getUnit(unit: string): UnitState {
    return this.units.get(unit) ?? { active: false, enabled: false };
  }

  /**
   * Make a method fail: queries answer false, mutations throw
   */
  failOn(method: ControllerMethod): this {
    this.failures.add(method);
    return this;
  }

  /**
   * Recorded calls to one method
   */
  callsTo(method: ControllerMethod): ControllerCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  /**
   * Recorded calls that change service manager state
   */
  mutations(): ControllerCall[] {
    return this.calls.filter((call) => call.method !== 'isActive' && call.method !== 'isEnabled');
  }

  isActive(unit: string, scope: ServiceScope): boolean {
    this.calls.push({ method: 'isActive', unit, scope });
    return !this.failures.has('isActive') && this.getUnit(unit).active;
  }

  isEnabled(unit: string, scope: ServiceScope): boolean {
    this.calls.push({ method: 'isEnabled', unit, scope });
    return !this.failures.has('isEnabled') && this.getUnit(unit).enabled;
  }

  start(unit: string, scope: ServiceScope): void {
    this.calls.push({ method: 'start', unit, scope });
    this.throwIfFailing('start', `systemctl start ${unit}`);
    this.setUnit(unit, this.enableOnStart ? { active: true, enabled: true } : { active: true });
  }

  stop(unit: string, scope: ServiceScope): void {
    this.calls.push({ method: 'stop', unit, scope });
    this.throwIfFailing('stop', `systemctl stop ${unit}`);
    this.setUnit(unit, { active: false });
  }

  reload(scope: ServiceScope): void {
    this.calls.push({ method: 'reload', scope });
    this.throwIfFailing('reload', 'systemctl daemon-reload');
  }

  followLogs(unit: string, scope: ServiceScope): void {
    this.calls.push({ method: 'followLogs', unit, scope });
    this.throwIfFailing('followLogs', `journalctl -u ${unit} -f`);
  }

  private throwIfFailing(method: ControllerMethod, commandLine: string): void {
    if (this.failures.has(method)) {
      throw new ServiceCommandError(commandLine, 1);
    }
  }
}
