import { type Request, type Response, type Router } from 'express';
import { requireUser, userOf } from '../auth/session.js';
import { type AppContext } from '../context.js';
import { AppError, isAppError } from '../errors.js';
import { expenseIdSchema } from '../schemas/common.js';
import { flash, redirectWith, render } from './flash.js';

const queryString = (value: unknown): string | undefined => typeof value === 'string' ? value : undefined;

const expenseIdFrom = (req: Request): number => {
  const parsed = expenseIdSchema.safeParse(req.params.id);
  if (!parsed.success) {
    throw new AppError('NOT_FOUND', 'Expense not found', { expenseId: req.params.id });
  }
  return parsed.data;
};

export const registerExpenseRoutes = (router: Router, context: AppContext): void => {
  const { auth, expenses, exports, log } = context;
  const authenticated = requireUser(auth);

  router.get('/expenses', authenticated, (req: Request, res: Response) => {
    const listing = expenses.listExpenses(userOf(res), {
      startDate: queryString(req.query.start_date),
      endDate: queryString(req.query.end_date)
    });
    for (const warning of listing.warnings) {
      flash(req, 'danger', warning);
    }
    render(req, res, 'expenses', { expenses: listing.expenses, filters: listing.filters });
  });

  router.get('/add', authenticated, (req: Request, res: Response) => { render(req, res, 'add_expense'); });

  router.post('/add', authenticated, (req: Request, res: Response) => {
    try {
      expenses.addExpense(userOf(res), req.body ?? {});
      redirectWith(req, res, '/expenses', 'success', 'Expense added successfully!');
    } catch (error) {
      if (isAppError(error, 'VALIDATION_ERROR') || isAppError(error, 'STORAGE_ERROR')) {
        log.warn('Add expense failed', { code: error.code, reason: error.message });
        redirectWith(req, res, '/add', 'danger', `Error adding expense: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  router.get('/edit/:id', authenticated, (req: Request, res: Response) => {
    try {
      const expense = expenses.getExpense(expenseIdFrom(req), userOf(res), 'edit');
      render(req, res, 'edit_expense', { expense });
    } catch (error) {
      if (isAppError(error, 'FORBIDDEN')) {
        redirectWith(req, res, '/expenses', 'danger', error.message);
        return;
      }
      throw error;
    }
  });

  router.post('/edit/:id', authenticated, (req: Request, res: Response) => {
    const expenseId = expenseIdFrom(req);
    try {
      expenses.editExpense(expenseId, userOf(res), req.body ?? {});
      redirectWith(req, res, '/expenses', 'success', 'Expense updated successfully!');
    } catch (error) {
      if (isAppError(error, 'FORBIDDEN')) {
        redirectWith(req, res, '/expenses', 'danger', error.message);
        return;
      }
      if (isAppError(error, 'VALIDATION_ERROR') || isAppError(error, 'STORAGE_ERROR')) {
        log.warn('Edit expense failed', { code: error.code, expenseId, reason: error.message });
        redirectWith(req, res, `/edit/${expenseId}`, 'danger', `Error updating expense: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  router.get('/delete/:id', authenticated, (req: Request, res: Response) => {
    const expenseId = expenseIdFrom(req);
    try {
      expenses.deleteExpense(expenseId, userOf(res));
      redirectWith(req, res, '/expenses', 'success', 'Expense deleted successfully!');
    } catch (error) {
      if (isAppError(error, 'FORBIDDEN')) {
        redirectWith(req, res, '/expenses', 'danger', error.message);
        return;
      }
      if (isAppError(error, 'STORAGE_ERROR')) {
        log.error('Delete expense failed', { expenseId, reason: error.message });
        redirectWith(req, res, '/expenses', 'danger', `Error deleting expense: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  router.get('/dashboard', authenticated, (req: Request, res: Response) => {
    render(req, res, 'dashboard', { ...expenses.dashboard(userOf(res)) });
  });

  router.get('/export', authenticated, (req: Request, res: Response) => {
    const document = exports.exportCsv(userOf(res));
    res.setHeader('Content-Type', document.contentType);
    res.setHeader('Content-Disposition', `attachment; filename=${document.filename}`);
    res.send(document.body);
  });
};
