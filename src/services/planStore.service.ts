import fs from "fs";
import path from "path";
import { Database } from "node-sqlite3-wasm";
import { z } from "zod";
import {
  ADD_DAY_INDEX_SQL,
  DATABASE_CONFIG,
  PLAN_STORE_SETUP_SQL,
} from "../configs/database";
import {
  DailyMeal,
  DailyPlan,
  MEAL_TYPES,
  MealType,
  PlanSummary,
  RunningPlan,
  WeeklyPlan,
} from "../types/model/runningPlan.model";
import { logger } from "../utils/logger";
import { CoachError, PersistenceError, errorMessage } from "../utils/errors";
import { PLAN_CONSTANTS } from "../utils/constants";
import { convertSqliteTimestamp, truncateText } from "../utils/convert";

const runningPlanRowSchema = z.object({
  id: z.number(),
  motivation: z.string(),
  feedback: z.string(),
  supplement_suggestion: z.string(),
  created_at: z.string(),
});

const summaryRowSchema = runningPlanRowSchema.pick({
  id: true,
  motivation: true,
  created_at: true,
});

const mealColumn = z.string().nullable();

const dailyPlanRowSchema = z.object({
  id: z.number(),
  day: z.string(),
  titles: z.string(),
  details: z.string(),
  week_number: z.number(),
  breakfast_suggestion: mealColumn,
  breakfast_calories: mealColumn,
  lunch_suggestion: mealColumn,
  lunch_calories: mealColumn,
  dinner_suggestion: mealColumn,
  dinner_calories: mealColumn,
});

type DailyPlanRow = z.infer<typeof dailyPlanRowSchema>;

const columnInfoSchema = z.object({ name: z.string() });

const SELECT_DAYS_SQL = `
  SELECT dp.id, dp.day, dp.titles, dp.details, dp.week_number,
         b.suggestion AS breakfast_suggestion, b.calories AS breakfast_calories,
         l.suggestion AS lunch_suggestion, l.calories AS lunch_calories,
         d.suggestion AS dinner_suggestion, d.calories AS dinner_calories
  FROM daily_plan dp
  LEFT JOIN daily_meal b ON dp.id = b.daily_plan_id AND b.meal_type = 'breakfast'
  LEFT JOIN daily_meal l ON dp.id = l.daily_plan_id AND l.meal_type = 'lunch'
  LEFT JOIN daily_meal d ON dp.id = d.daily_plan_id AND d.meal_type = 'dinner'
  WHERE dp.running_plan_id = ?
  ORDER BY dp.week_number, dp.day_index, dp.day
`;

const toMeal = (row: DailyPlanRow, mealType: MealType): DailyMeal => {
  const suggestion = row[`${mealType}_suggestion` as const];
  const calories = row[`${mealType}_calories` as const];
  if (suggestion === null || calories === null) {
    throw new PersistenceError(
      `Daily plan ${row.id} (week ${row.week_number}, ${row.day}) has no ${mealType} meal`
    );
  }
  return { suggestion, calories };
};

const toDailyPlan = (row: DailyPlanRow): DailyPlan => ({
  day: row.day,
  titles: row.titles,
  details: row.details,
  breakfast: toMeal(row, "breakfast"),
  lunch: toMeal(row, "lunch"),
  dinner: toMeal(row, "dinner"),
});

/**
 * SQLite persistence for running plans. Each operation opens its own
 * connection and closes it before returning.
 */
export class PlanStoreService {
  private readonly dbPath: string;

  constructor(dbPath: string = DATABASE_CONFIG.path) {
    this.dbPath = dbPath;
  }

  private withConnection<T>(work: (db: Database) => T): T {
    const db = new Database(this.dbPath);
    try {
      db.exec(`PRAGMA busy_timeout = ${DATABASE_CONFIG.timeoutMs}`);
      db.exec("PRAGMA foreign_keys = ON");
      return work(db);
    } finally {
      db.close();
    }
  }

  private withTransaction<T>(db: Database, work: () => T): T {
    db.exec("BEGIN");
    try {
      const result = work();
      db.exec("COMMIT");
      return result;
    } catch (error) {
      if (db.inTransaction) db.exec("ROLLBACK");
      throw error;
    }
  }

  private toPersistenceError(action: string, error: unknown): CoachError {
    if (error instanceof CoachError) return error;
    logger.error(`Error ${action}: ${errorMessage(error)}`);
    return new PersistenceError(`Error ${action}: ${errorMessage(error)}`, error);
  }

  initSchema(): boolean {
    try {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      this.withConnection((db) =>
        this.withTransaction(db, () => {
          db.exec(PLAN_STORE_SETUP_SQL);
          const columns = z
            .array(columnInfoSchema)
            .parse(db.all("PRAGMA table_info(daily_plan)"));
          if (!columns.some((column) => column.name === "day_index")) {
            logger.info("Adding day_index column to daily_plan");
            db.exec(ADD_DAY_INDEX_SQL);
          }
        })
      );
      logger.info(`Database schema ready: ${this.dbPath}`);
      return true;
    } catch (error) {
      logger.error(`Error creating database schema: ${errorMessage(error)}`);
      return false;
    }
  }

  save(plan: RunningPlan): number {
    try {
      const planId = this.withConnection((db) =>
        this.withTransaction(db, () => {
          const runningPlanId = Number(
            db.run(
              "INSERT INTO running_plan (motivation, feedback, supplement_suggestion) VALUES (?, ?, ?)",
              [plan.motivation, plan.feedback, plan.supplement_suggestion]
            ).lastInsertRowid
          );

          plan.plan.forEach((weekly, weekIndex) => {
            weekly.forEach((daily, dayIndex) => {
              const dailyPlanId = Number(
                db.run(
                  "INSERT INTO daily_plan (running_plan_id, day, titles, details, week_number, day_index) VALUES (?, ?, ?, ?, ?, ?)",
                  [runningPlanId, daily.day, daily.titles, daily.details, weekIndex + 1, dayIndex]
                ).lastInsertRowid
              );

              for (const mealType of MEAL_TYPES) {
                const meal = daily[mealType];
                db.run(
                  "INSERT INTO daily_meal (daily_plan_id, meal_type, suggestion, calories) VALUES (?, ?, ?, ?)",
                  [dailyPlanId, mealType, meal.suggestion, meal.calories]
                );
              }
            });
          });

          return runningPlanId;
        })
      );

      logger.info(`Plan saved to database with ID: ${planId}`);
      return planId;
    } catch (error) {
      throw this.toPersistenceError("saving plan to database", error);
    }
  }

  load(planId: number): RunningPlan | null {
    try {
      return this.withConnection((db) => {
        const found = db.get(
          "SELECT id, motivation, feedback, supplement_suggestion, created_at FROM running_plan WHERE id = ?",
          [planId]
        );

        if (!found) {
          logger.warn(`Plan with ID ${planId} not found`);
          return null;
        }

        const planRow = runningPlanRowSchema.parse(found);
        const dayRows = z.array(dailyPlanRowSchema).parse(db.all(SELECT_DAYS_SQL, [planId]));

        // rows arrive ordered by week_number, so insertion order is week order
        const weeks = new Map<number, WeeklyPlan>();
        for (const row of dayRows) {
          const weekly = weeks.get(row.week_number) ?? [];
          weekly.push(toDailyPlan(row));
          weeks.set(row.week_number, weekly);
        }

        return {
          motivation: planRow.motivation,
          feedback: planRow.feedback,
          supplement_suggestion: planRow.supplement_suggestion,
          plan: Array.from(weeks.values()),
        };
      });
    } catch (error) {
      throw this.toPersistenceError("loading plan from database", error);
    }
  }

  list(): PlanSummary[] {
    try {
      const rows = z
        .array(summaryRowSchema)
        .parse(
          this.withConnection((db) =>
            db.all(
              "SELECT id, motivation, created_at FROM running_plan ORDER BY created_at DESC, id DESC"
            )
          )
        );

      return rows.map((row) => ({
        id: row.id,
        motivation: truncateText(row.motivation, PLAN_CONSTANTS.SUMMARY_MOTIVATION_LENGTH),
        createdAt: convertSqliteTimestamp(row.created_at),
      }));
    } catch (error) {
      throw this.toPersistenceError("listing plans", error);
    }
  }

  delete(planId: number): boolean {
    try {
      const removed = this.withConnection((db) =>
        this.withTransaction(db, () => {
          // children first: meals, then days, then the plan row
          db.run(
            "DELETE FROM daily_meal WHERE daily_plan_id IN (SELECT id FROM daily_plan WHERE running_plan_id = ?)",
            [planId]
          );
          db.run("DELETE FROM daily_plan WHERE running_plan_id = ?", [planId]);
          return db.run("DELETE FROM running_plan WHERE id = ?", [planId]).changes > 0;
        })
      );

      if (removed) {
        logger.info(`Plan ${planId} deleted`);
      } else {
        logger.warn(`Plan with ID ${planId} not found, nothing deleted`);
      }
      return removed;
    } catch (error) {
      throw this.toPersistenceError("deleting plan", error);
    }
  }
}

export const planStoreService = new PlanStoreService();
