export const MEAL_TYPES = ["breakfast", "lunch", "dinner"] as const;

export type MealType = (typeof MEAL_TYPES)[number];

export interface DailyMeal {
  suggestion: string;
  calories: string; // free text, e.g. "450" or "about 500 kcal"
}

export interface DailyPlan {
  day: string;
  titles: string;
  details: string;
  breakfast: DailyMeal;
  lunch: DailyMeal;
  dinner: DailyMeal;
}

// Position in RunningPlan.plan is the week number (1-based)
export type WeeklyPlan = DailyPlan[];

export interface RunningPlan {
  motivation: string;
  feedback: string;
  supplement_suggestion: string;
  plan: WeeklyPlan[];
}

export interface PlanSummary {
  id: number;
  motivation: string;
  createdAt: string;
}
