import { type NextFunction, type Request, type Response, type Router } from 'express';
import { optionalUser, requireUser, sessionOf } from '../auth/session.js';
import { type AppContext } from '../context.js';
import { isAppError } from '../errors.js';
import { redirectWith, render } from './flash.js';

export const registerAuthRoutes = (router: Router, context: AppContext): void => {
  const { auth, log } = context;

  router.get('/', (req: Request, res: Response) => {
    if (optionalUser(auth, req) !== undefined) {
      res.redirect(303, '/expenses');
      return;
    }
    render(req, res, 'home');
  });

  router.get('/register', (req: Request, res: Response) => { render(req, res, 'register'); });

  const registerHandler = async (req: Request, res: Response): Promise<void> => {
    try {
      await auth.register(req.body ?? {});
      redirectWith(req, res, '/login', 'success', 'Registration successful! Please log in.');
    } catch (error) {
      if (isAppError(error, 'DUPLICATE_USERNAME') || isAppError(error, 'VALIDATION_ERROR')) {
        log.warn('Registration rejected', { code: error.code });
        redirectWith(req, res, '/register', 'danger', error.message);
        return;
      }
      throw error;
    }
  };

  router.post('/register', (req: Request, res: Response, next: NextFunction) => { registerHandler(req, res).catch(next); });

  router.get('/login', (req: Request, res: Response) => { render(req, res, 'login'); });

  const loginHandler = async (req: Request, res: Response): Promise<void> => {
    try {
      await auth.login(sessionOf(req), req.body ?? {});
      res.redirect(303, '/expenses');
    } catch (error) {
      if (isAppError(error, 'INVALID_CREDENTIALS')) {
        redirectWith(req, res, '/login', 'danger', error.message);
        return;
      }
      throw error;
    }
  };

  router.post('/login', (req: Request, res: Response, next: NextFunction) => { loginHandler(req, res).catch(next); });

  const logoutHandler = async (req: Request, res: Response): Promise<void> => {
    await auth.logout(sessionOf(req));
    redirectWith(req, res, '/', 'success', 'You have been logged out.');
  };

  router.get('/logout', requireUser(auth), (req: Request, res: Response, next: NextFunction) => { logoutHandler(req, res).catch(next); });
};
