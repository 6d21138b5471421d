import { type Request, type RequestHandler, type Response } from 'express';
import session from 'express-session';
import { AppError, isAppError } from '../errors.js';
import { type FlashMessage, redirectWith } from '../routes/flash.js';
import { type AuthService } from './service.js';
import { type AuthSession, type User } from './types.js';

declare module 'express-session' {
  interface SessionData {
    userId: number
    flash: FlashMessage[]
  }
}

declare global {
  namespace Express {
    interface Locals {
      user?: User
    }
  }
}

export interface SessionOptions {
  secret: string
  secure: boolean
}

export const createSessionMiddleware = ({ secret, secure }: SessionOptions): RequestHandler => session({
  name: 'expense_tracker.sid',
  secret,
  resave: false,
  saveUninitialized: false,
  cookie: {
    httpOnly: true,
    sameSite: 'lax',
    secure
  }
});

const regenerate = async (req: Request): Promise<void> => {
  await new Promise<void>((resolve, reject) => {
    req.session.regenerate(error => {
      if (error != null) {
        reject(error);
        return;
      }
      resolve();
    });
  });
};

/** Adapts express-session; binding rotates the session id. */
export const sessionOf = (req: Request): AuthSession => ({
  userId: () => req.session.userId,
  bind: async userId => {
    await regenerate(req);
    req.session.userId = userId;
  },
  clear: async () => {
    await regenerate(req);
  }
});

export const optionalUser = (auth: AuthService, req: Request): User | undefined => {
  try {
    return auth.currentUser(sessionOf(req));
  } catch (error) {
    if (isAppError(error, 'UNAUTHENTICATED')) return undefined;
    throw error;
  }
};

/** Guard for protected routes: unauthenticated requests are sent to /login. */
export const requireUser = (auth: AuthService): RequestHandler => (req, res, next) => {
  try {
    res.locals.user = auth.currentUser(sessionOf(req));
    next();
  } catch (error) {
    if (isAppError(error, 'UNAUTHENTICATED')) {
      redirectWith(req, res, '/login', 'danger', error.message);
      return;
    }
    next(error);
  }
};

export const userOf = (res: Response): User => {
  const user = res.locals.user;
  if (user === undefined) {
    throw new AppError('UNAUTHENTICATED', 'Please log in to access this page.');
  }
  return user;
};
