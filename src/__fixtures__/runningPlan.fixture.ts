import { DailyPlan, RunningPlan } from "../types/model/runningPlan.model";

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
];

export const buildDay = (day: string, week = 1): DailyPlan => ({
  day,
  titles: `Week ${week} ${day} run`,
  details: `Easy ${week * 2} km at conversational pace`,
  breakfast: { suggestion: "Oatmeal with berries", calories: "350" },
  lunch: { suggestion: "Chicken rice bowl", calories: "550" },
  dinner: { suggestion: "Salmon with sweet potato", calories: "650" },
});

export const buildPlan = (weeks: number, days: string[] = WEEKDAYS): RunningPlan => ({
  motivation: "Every kilometre counts, keep showing up.",
  feedback: "Resting heart rate of 58 bpm shows a solid aerobic base.",
  supplement_suggestion: "Vitamin D and magnesium after long runs.",
  plan: Array.from({ length: weeks }, (_, index) =>
    days.map((day) => buildDay(day, index + 1))
  ),
});
