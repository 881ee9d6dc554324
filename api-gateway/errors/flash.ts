import { Response } from 'express';
import { FlashStore } from '../../engine/errors/errorDispatcher';

/**
 * Flash store scoped to one response. Messages land in `res.locals.flash`
 * for whatever renders the page.
 */
export class ResponseFlashStore implements FlashStore {
  constructor(private readonly res: Response) {}

  flash(key: string, value: unknown): void {
    const current = this.all();
    this.res.locals.flash = { ...current, [key]: value };
  }

  all(): Record<string, unknown> {
    const flash: unknown = this.res.locals.flash;
    return typeof flash === 'object' && flash !== null ? { ...flash } : {};
  }
}
