import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { CredentialStore } from './credentials.js';
import { openDatabase } from './db.js';
import { LedgerStore } from './ledger.js';
import { LoginJournal } from './loginJournal.js';
import { SessionFacade, SessionRegistry } from './session.js';

const config = loadConfig();
const db = openDatabase(config.dbPath);

const facade = new SessionFacade({
  credentials: new CredentialStore(db, config.bcryptRounds),
  ledger: new LedgerStore(db, config.categoryPolicy),
  journal: new LoginJournal(db),
  config,
});

const sessions = new SessionRegistry({
  idleMs: config.sessionIdleMinutes * 60 * 1000,
  maxSessions: config.maxSessions,
});

const app = createApp(facade, sessions);

app.listen(config.port, () => {
  console.log(`Ledger API running on http://localhost:${config.port} (db: ${config.dbPath}, categories: ${config.categoryPolicy.mode})`);
});
