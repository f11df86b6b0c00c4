import fs from "fs/promises";
import path from "path";
import escapeHtml from "escape-html";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import {
  DailyMeal,
  DailyPlan,
  RunningPlan,
  WeeklyPlan,
} from "../types/model/runningPlan.model";
import { validatePlanStructure } from "../validators/running-plan.validator";

// copied next to the compiled output by the build script
const STYLESHEET_PATH = path.resolve(__dirname, "..", "..", "assets", "style.css");

export interface HtmlRenderOptions {
  title?: string;
  stylesheetHref?: string;
}

export interface OutputPaths {
  html: string;
  json: string;
  css: string;
}

export type OutputKind = keyof OutputPaths;

export interface OutputFileResult {
  kind: OutputKind;
  path: string;
  ok: boolean;
  error?: string;
}

const renderMeal = (label: string, meal: DailyMeal): string =>
  `            <li><strong>${label}:</strong> ${escapeHtml(meal.suggestion)} - (${escapeHtml(meal.calories)} kcal)</li>`;

const renderDay = (day: DailyPlan): string =>
  [
    `      <div class="day">`,
    `        <div class="day-title">${escapeHtml(day.day)} - ${escapeHtml(day.titles)}</div>`,
    `        <div class="details">${escapeHtml(day.details)}</div>`,
    `        <div class="meal_plan">`,
    `          <h4>Nutrition Plan</h4>`,
    `          <ul>`,
    renderMeal("Breakfast", day.breakfast),
    renderMeal("Lunch", day.lunch),
    renderMeal("Dinner", day.dinner),
    `          </ul>`,
    `        </div>`,
    `      </div>`,
  ].join("\n");

const renderWeek = (weekly: WeeklyPlan, weekNumber: number): string =>
  [
    `    <section class="week">`,
    `      <h2>Week ${weekNumber}</h2>`,
    ...weekly.map(renderDay),
    `    </section>`,
  ].join("\n");

/**
 * Turns a decoded plan into the files and text shown to the runner.
 */
export class PlanRendererService {
  renderHtml(plan: RunningPlan, options: HtmlRenderOptions = {}): string {
    const title = options.title ?? "Your Running Plan";
    const stylesheetHref = options.stylesheetHref ?? "style.css";

    try {
      return [
        `<!DOCTYPE html>`,
        `<html lang="en">`,
        `<head>`,
        `  <meta charset="UTF-8">`,
        `  <meta name="viewport" content="width=device-width, initial-scale=1">`,
        `  <title>${escapeHtml(title)}</title>`,
        `  <link rel="stylesheet" href="${escapeHtml(stylesheetHref)}">`,
        `</head>`,
        `<body>`,
        `  <header class="plan-header">`,
        `    <h1>${escapeHtml(plan.motivation)}</h1>`,
        `    <p class="plan-feedback">${escapeHtml(plan.feedback)}</p>`,
        `    <p class="plan-supplements">${escapeHtml(plan.supplement_suggestion)}</p>`,
        `  </header>`,
        `  <div class="week-grid">`,
        ...plan.plan.map((weekly, index) => renderWeek(weekly, index + 1)),
        `  </div>`,
        `</body>`,
        `</html>`,
        ``,
      ].join("\n");
    } catch (error) {
      logger.error(`Error generating HTML: ${errorMessage(error)}`);
      return `<html><body><h1>Error generating HTML</h1><p>${escapeHtml(errorMessage(error))}</p></body></html>`;
    }
  }

  renderJson(plan: RunningPlan): string {
    return JSON.stringify(plan, null, 2);
  }

  renderConsoleSummary(plan: RunningPlan): string[] {
    const lines = [
      `Motivation: ${plan.motivation}`,
      "",
      `Feedback: ${plan.feedback}`,
      "",
      `Supplements: ${plan.supplement_suggestion}`,
      "",
    ];

    plan.plan.forEach((weekly, index) => {
      lines.push(`--- Week ${index + 1} ---`);
      for (const daily of weekly) {
        lines.push(
          `- ${daily.day}: ${daily.titles} - ${daily.details}`,
          `  🥣 Breakfast: ${daily.breakfast.suggestion} (${daily.breakfast.calories})`,
          `  🥗 Lunch: ${daily.lunch.suggestion} (${daily.lunch.calories})`,
          `  🍽️ Dinner: ${daily.dinner.suggestion} (${daily.dinner.calories})`
        );
      }
      lines.push("");
    });

    return lines;
  }

  validateStructure(plan: unknown): boolean {
    return validatePlanStructure(plan);
  }

  async stylesheet(): Promise<string> {
    return fs.readFile(STYLESHEET_PATH, "utf-8");
  }

  /**
   * Writes HTML, JSON and CSS next to each other. Each file is attempted
   * independently; failures are reported per file.
   */
  async writeOutputs(plan: RunningPlan, paths: OutputPaths): Promise<OutputFileResult[]> {
    const contents: Record<OutputKind, () => Promise<string>> = {
      html: async () =>
        this.renderHtml(plan, {
          stylesheetHref: path.relative(path.dirname(paths.html), paths.css),
        }),
      json: async () => this.renderJson(plan),
      css: () => this.stylesheet(),
    };

    const results: OutputFileResult[] = [];
    for (const kind of ["css", "html", "json"] as const) {
      const target = paths[kind];
      try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, await contents[kind](), "utf-8");
        logger.info(`${kind.toUpperCase()} file written: ${target}`);
        results.push({ kind, path: target, ok: true });
      } catch (error) {
        logger.error(`Error writing ${kind.toUpperCase()} file ${target}: ${errorMessage(error)}`);
        results.push({ kind, path: target, ok: false, error: errorMessage(error) });
      }
    }
    return results;
  }
}

export const planRendererService = new PlanRendererService();
