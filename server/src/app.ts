import express, { type Request, type Response } from 'express';
import cors from 'cors';
import {
  err,
  ok,
  validationError,
  type BudgetInput,
  type DateRange,
  type ExpenseInput,
  type IncomeInput,
  type LedgerError,
  type Result,
  type ValidationError,
} from '../../src/domain/types.js';
import { SessionRegistry, type Session, type SessionFacade } from './session.js';

type Body = Record<string, unknown>;

const STATUS: Record<LedgerError['type'], number> = {
  ValidationError: 400,
  AuthenticationError: 401,
  NotFoundError: 404,
  ConflictError: 409,
  StorageUnavailable: 503,
};

/** Express API over the session façade. Sessions travel as Bearer tokens. */
export function createApp(facade: SessionFacade, sessions: SessionRegistry = new SessionRegistry()): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  /** Resolve the caller's session, or answer 401 */
  const requireSession = (req: Request, res: Response): Session | undefined => {
    const token = bearerToken(req);
    const session = token === undefined ? undefined : sessions.get(token);
    if (!session) {
      res.status(401).json({ error: 'Not logged in' });
    }
    return session;
  };

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // --- Auth ---

  app.post('/auth/register', async (req, res) => {
    try {
      const body = bodyOf(req);
      const username = text(body, 'username');
      const password = text(body, 'password');
      const email = text(body, 'email');
      if (username === undefined || password === undefined) {
        sendError(res, validationError('InvalidUsername', 'username and password are required'));
        return;
      }
      const result = await facade.register(username, password, email);
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.status(201).json({ ok: true });
    } catch (error) {
      console.error('Error registering user:', error);
      res.status(500).json({ error: 'Failed to register user' });
    }
  });

  app.post('/auth/login', async (req, res) => {
    try {
      const body = bodyOf(req);
      const result = await facade.login(text(body, 'username') ?? '', text(body, 'password') ?? '');
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      const token = sessions.open(result.value);
      res.json({ token, username: result.value.username, period: result.value.period });
    } catch (error) {
      console.error('Error logging in:', error);
      res.status(500).json({ error: 'Failed to log in' });
    }
  });

  app.post('/auth/logout', (req, res) => {
    const token = bearerToken(req);
    if (token !== undefined) sessions.close(token);
    res.json({ ok: true });
  });

  app.put('/auth/password', async (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    try {
      const body = bodyOf(req);
      const result = await facade.credentials.changePassword(
        session.username,
        text(body, 'currentPassword') ?? '',
        text(body, 'newPassword') ?? '',
      );
      // Other logins of this user end with the old password
      if (result.ok) sessions.closeUser(session.username, bearerToken(req));
      sendResult(res, result, () => ({ ok: true }));
    } catch (error) {
      console.error('Error changing password:', error);
      res.status(500).json({ error: 'Failed to change password' });
    }
  });

  // --- Profile ---

  app.get('/profile/email', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.credentials.getEmail(session.username), (email) => ({ email }));
  });

  app.put('/profile/email', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const body = bodyOf(req);
    const email = body.email === null ? null : text(body, 'email');
    if (email === undefined) {
      sendError(res, validationError('InvalidEmail', 'email must be a string or null'));
      return;
    }
    sendResult(res, facade.credentials.setEmail(session.username, email), () => ({ email }));
  });

  // --- Categories ---

  app.get('/categories', (_req, res) => {
    res.json(facade.ledger.categories());
  });

  // --- Expenses ---

  app.get('/expenses', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.listExpenses(session.username, rangeOf(req)), (rows) => rows);
  });

  app.get('/expenses/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.getExpense(session.username, req.params.id), (row) => row);
  });

  app.post('/expenses', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const input = readExpense(bodyOf(req));
    if (!input.ok) {
      sendError(res, input.error);
      return;
    }
    sendResult(res, facade.ledger.addExpense(session.username, input.value), (id) => ({ id }), 201);
  });

  app.put('/expenses/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const input = readExpense(bodyOf(req));
    if (!input.ok) {
      sendError(res, input.error);
      return;
    }
    sendResult(res, facade.ledger.updateExpense(session.username, req.params.id, input.value), () => ({ ok: true }));
  });

  app.delete('/expenses/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.deleteExpense(session.username, req.params.id), () => ({ ok: true }));
  });

  // --- Incomes ---

  app.get('/incomes', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.listIncomes(session.username, rangeOf(req)), (rows) => rows);
  });

  app.get('/incomes/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.getIncome(session.username, req.params.id), (row) => row);
  });

  app.post('/incomes', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const input = readIncome(bodyOf(req));
    if (!input.ok) {
      sendError(res, input.error);
      return;
    }
    sendResult(res, facade.ledger.addIncome(session.username, input.value), (id) => ({ id }), 201);
  });

  app.put('/incomes/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const input = readIncome(bodyOf(req));
    if (!input.ok) {
      sendError(res, input.error);
      return;
    }
    sendResult(res, facade.ledger.updateIncome(session.username, req.params.id, input.value), () => ({ ok: true }));
  });

  app.delete('/incomes/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.deleteIncome(session.username, req.params.id), () => ({ ok: true }));
  });

  // --- Budgets ---

  // GET /budgets?month=M&year=YYYY (defaults to the session's period)
  app.get('/budgets', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const { year, month } = session.period;
    sendResult(
      res,
      facade.ledger.listBudgets(session.username, queryInt(req, 'month') ?? month, queryInt(req, 'year') ?? year),
      (rows) => rows,
    );
  });

  app.put('/budgets', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const input = readBudget(bodyOf(req));
    if (!input.ok) {
      sendError(res, input.error);
      return;
    }
    sendResult(res, facade.ledger.setBudget(session.username, input.value), (id) => ({ id }));
  });

  app.delete('/budgets/:id', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.ledger.deleteBudget(session.username, req.params.id), () => ({ ok: true }));
  });

  // --- Reporting ---

  app.get('/period', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    res.json(session.period);
  });

  app.put('/period', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    const body = bodyOf(req);
    sendResult(res, session.selectPeriod(numberField(body, 'year') ?? NaN, numberField(body, 'month') ?? NaN), (p) => p);
  });

  app.get('/dashboard', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.dashboard(session), (d) => d);
  });

  app.get('/logins', (req, res) => {
    const session = requireSession(req, res);
    if (!session) return;
    sendResult(res, facade.recentLogins(session, queryInt(req, 'limit')), (ts) => ts);
  });

  return app;
}

// --- helpers ---

function sendError(res: Response, error: LedgerError): void {
  res.status(STATUS[error.type]).json({ error });
}

function sendResult<T, E extends LedgerError>(
  res: Response,
  result: Result<T, E>,
  toJson: (value: T) => unknown,
  status = 200,
): void {
  if (!result.ok) {
    sendError(res, result.error);
    return;
  }
  res.status(status).json(toJson(result.value));
}

function bearerToken(req: Request): string | undefined {
  const header = req.get('authorization');
  if (!header?.startsWith('Bearer ')) return undefined;
  return header.slice('Bearer '.length).trim() || undefined;
}

function isRecord(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function text(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(body: Body, key: string): number | undefined {
  const value = body[key];
  return typeof value === 'number' ? value : undefined;
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function queryInt(req: Request, key: string): number | undefined {
  const value = queryString(req, key);
  return value === undefined ? undefined : Number(value);
}

// GET ...?from=YYYY-MM-DD&to=YYYY-MM-DD
function rangeOf(req: Request): DateRange {
  return { from: queryString(req, 'from'), to: queryString(req, 'to') };
}

function readIncome(body: Body): Result<IncomeInput, ValidationError> {
  const amount = numberField(body, 'amount');
  if (amount === undefined) return err(validationError('InvalidAmount', 'amount must be a number'));
  const date = text(body, 'date');
  if (date === undefined) return err(validationError('InvalidDate', 'date is required (YYYY-MM-DD)'));
  const description = body.description === undefined ? undefined : text(body, 'description');
  if (body.description !== undefined && description === undefined) {
    return err(validationError('InvalidDescription', 'description must be a string'));
  }
  return ok({ amount, date, description });
}

function readExpense(body: Body): Result<ExpenseInput, ValidationError> {
  const category = text(body, 'category');
  if (category === undefined) return err(validationError('InvalidCategory', 'category is required'));
  const income = readIncome(body);
  if (!income.ok) return income;
  return ok({ ...income.value, category });
}

function readBudget(body: Body): Result<BudgetInput, ValidationError> {
  const category = text(body, 'category');
  if (category === undefined) return err(validationError('InvalidCategory', 'category is required'));
  const month = numberField(body, 'month');
  if (month === undefined) return err(validationError('InvalidMonth', 'month must be a number'));
  const year = numberField(body, 'year');
  if (year === undefined) return err(validationError('InvalidYear', 'year must be a number'));
  const amount = numberField(body, 'amount');
  if (amount === undefined) return err(validationError('InvalidAmount', 'amount must be a number'));
  return ok({ category, month, year, amount });
}
