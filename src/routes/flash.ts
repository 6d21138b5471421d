import { type Request, type Response } from 'express';

export type FlashCategory = 'success' | 'danger';

export interface FlashMessage {
  category: FlashCategory
  message: string
}

export const flash = (req: Request, category: FlashCategory, message: string): void => {
  req.session.flash = [...(req.session.flash ?? []), { category, message }];
};

/** Returns queued messages and clears them, so each is shown once. */
export const takeFlash = (req: Request): FlashMessage[] => {
  const messages = req.session.flash ?? [];
  delete req.session.flash;
  return messages;
};

/** Answers with the view model a template would render. */
export const render = (req: Request, res: Response, view: string, data: Record<string, unknown> = {}): void => {
  res.json({ view, messages: takeFlash(req), ...data });
};

export const redirectWith = (req: Request, res: Response, to: string, category: FlashCategory, message: string): void => {
  flash(req, category, message);
  res.redirect(303, to);
};
