import { loadConfig } from "./environment";

const config = loadConfig();

export const DATABASE_CONFIG = {
  path: config.database.path,
  timeoutMs: 5000,
};

// Schema setup script, safe to run on every start
export const PLAN_STORE_SETUP_SQL = `
CREATE TABLE IF NOT EXISTS running_plan (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    motivation TEXT NOT NULL,
    feedback TEXT NOT NULL,
    supplement_suggestion TEXT NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS daily_plan (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    running_plan_id INTEGER NOT NULL,
    day TEXT NOT NULL,
    titles TEXT NOT NULL,
    details TEXT NOT NULL,
    week_number INTEGER NOT NULL,
    day_index INTEGER NOT NULL DEFAULT 0,
    FOREIGN KEY (running_plan_id) REFERENCES running_plan (id)
);

CREATE TABLE IF NOT EXISTS daily_meal (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    daily_plan_id INTEGER NOT NULL,
    meal_type TEXT NOT NULL CHECK (meal_type IN ('breakfast', 'lunch', 'dinner')),
    suggestion TEXT NOT NULL,
    calories TEXT NOT NULL,
    FOREIGN KEY (daily_plan_id) REFERENCES daily_plan (id)
);

CREATE INDEX IF NOT EXISTS idx_daily_plan_running_plan_id
ON daily_plan(running_plan_id);

CREATE INDEX IF NOT EXISTS idx_daily_meal_daily_plan_id
ON daily_meal(daily_plan_id);
`;

// Files written before day_index existed keep their rows; they load sorted by day label
export const ADD_DAY_INDEX_SQL = `
ALTER TABLE daily_plan ADD COLUMN day_index INTEGER NOT NULL DEFAULT 0
`;
