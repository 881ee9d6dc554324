/**
 * Explicit store of simulated error conditions. Constructed by the host and
 * passed to whatever needs it; never a module-level singleton.
 */
export class TestingConditions {
  private readonly conditions = new Map<string, boolean>();
  private testingEnabled: boolean;

  constructor(environment: string) {
    this.testingEnabled = environment !== 'production';
  }

  setTestingEnabled(enabled: boolean): this {
    this.testingEnabled = enabled;
    return this;
  }

  isTestingEnabled(): boolean {
    return this.testingEnabled;
  }

  setCondition(condition: string, value: boolean): this {
    this.conditions.set(condition, value);
    return this;
  }

  isTesting(condition: string): boolean {
    return this.testingEnabled && this.conditions.get(condition) === true;
  }

  getActiveConditions(): Record<string, true> {
    const active: Record<string, true> = {};
    for (const [condition, value] of this.conditions) {
      if (value) {
        active[condition] = true;
      }
    }
    return active;
  }

  resetAllConditions(): this {
    this.conditions.clear();
    return this;
  }
}
