#!/usr/bin/env node
import fs from "fs";
import readline from "readline/promises";
import chalk from "chalk";
import { logger } from "./utils/logger";
import { AppConfig, loadConfig, validateConfig } from "./configs/environment";
import { validateUserInput } from "./validators/plan-request.validator";
import { CoachError, InputValidationError, errorMessage } from "./utils/errors";
import { PlanStoreService, planStoreService } from "./services/planStore.service";
import { planRendererService } from "./services/planRenderer.service";
import {
  GeneratePlanResult,
  TrainingPlanService,
  defaultOutputPaths,
  trainingPlanService,
} from "./services/trainingPlan.service";

const HELP_FLAGS = ["-h", "--help", "help"];

export const isHelpRequest = (args: string[]): boolean =>
  args.length > 0 && HELP_FLAGS.includes(args[0]);

export const helpText = (imagePath: string): string[] => [
  "🆘 Running Coach Help",
  "=".repeat(30),
  "Usage: running-coach [--help]",
  "",
  "Setup Requirements:",
  "1. OpenAI API key (OPENAI_API_KEY in the environment or .env)",
  `2. Fitness watch screenshot saved as ${imagePath} (optional but recommended)`,
  "3. Internet connection",
  "",
  "Example goals:",
  "• 'run a 5K in 6 weeks'",
  "• 'train for a half marathon in 12 weeks'",
  "• 'improve my 10K time in 8 weeks'",
  "• 'prepare for my first marathon in 16 weeks'",
];

const print = (lines: string[]) => {
  for (const line of lines) console.log(line);
};

class RunningCoachApplication {
  constructor(
    private readonly trainingPlans: TrainingPlanService = trainingPlanService,
    private readonly store: PlanStoreService = planStoreService,
    private readonly config: AppConfig = loadConfig()
  ) {}

  /**
   * Checks configuration and prepares the database. Returns false when the
   * process cannot continue.
   */
  initialize(): boolean {
    try {
      validateConfig();
    } catch (error) {
      logger.error(`Failed to initialize application: ${errorMessage(error)}`);
      if (error instanceof CoachError) {
        print(error.hints.map((hint) => `   ${hint}`));
      }
      return false;
    }

    if (!this.store.initSchema()) {
      logger.warn("Database unavailable, plans will not be saved");
    }
    return true;
  }

  private async promptForGoal(rl: readline.Interface): Promise<string> {
    for (;;) {
      const answer = await rl.question(
        "\nWhat is your running goal? (e.g., 'run a 10k in 8 weeks'): "
      );
      try {
        return validateUserInput(answer);
      } catch (error) {
        if (!(error instanceof InputValidationError)) throw error;
        console.log(chalk.red(`❌ ${error.message}`));
      }
    }
  }

  private printImageInstructions(imagePath: string): void {
    print([
      chalk.cyan("📸 Image Setup Instructions:"),
      "   1. Take a screenshot of your fitness watch data",
      `   2. Save it as '${imagePath}' in the current directory`,
      "   3. Or set IMAGE_PATH in your .env file",
      `   Current directory: ${process.cwd()}`,
    ]);
  }

  private printResult(result: GeneratePlanResult): void {
    console.log(chalk.green("\n✅ Plan Generated Successfully!\n"));
    print(planRendererService.renderConsoleSummary(result.plan));

    for (const warning of result.warnings) {
      console.log(chalk.yellow(`⚠️  ${warning}`));
    }

    console.log("\n📄 Output files:");
    for (const output of result.outputs) {
      console.log(
        output.ok
          ? chalk.green(`✅ ${output.kind.toUpperCase()} file generated: ${output.path}`)
          : chalk.red(`❌ ${output.kind.toUpperCase()} file failed: ${output.error}`)
      );
    }

    if (result.planId !== null) {
      console.log(chalk.green(`✅ Plan saved to database with ID: ${result.planId}`));
    } else {
      console.log(chalk.yellow(`⚠️  Database save failed: ${result.persistenceError}`));
    }
  }

  private printFailure(error: unknown): void {
    console.log(chalk.red(`❌ An error occurred: ${errorMessage(error)}`));
    const hints = error instanceof CoachError ? error.hints : [];
    if (hints.length > 0) {
      console.log("\nTroubleshooting:");
      print(hints.map((hint) => `• ${hint}`));
    }
    if (error instanceof CoachError && error.retryable) {
      console.log(chalk.yellow("This failure is temporary, running again may succeed."));
    }
  }

  async run(args: string[]): Promise<number> {
    const config = this.config;

    if (isHelpRequest(args)) {
      print(helpText(config.image.path));
      return 0;
    }

    console.log(chalk.bold("🏃 Running Coach - Personalized Training Plans"));
    console.log("=".repeat(50));

    if (!this.initialize()) return 1;

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    let query: string;
    try {
      query = await this.promptForGoal(rl);
    } finally {
      rl.close();
    }

    if (!fs.existsSync(config.image.path)) {
      this.printImageInstructions(config.image.path);
    }

    console.log("\n🤖 Generating your personalized running plan...");
    console.log("   This may take 10-30 seconds...");

    try {
      const result = await this.trainingPlans.generate({
        query,
        imagePath: config.image.path,
        outputPaths: defaultOutputPaths(config),
      });
      this.printResult(result);
      console.log(chalk.green("\n🎉 Training plan generation complete!"));
      return 0;
    } catch (error) {
      logger.error(`Plan generation failed: ${errorMessage(error)}`);
      this.printFailure(error);
      return 1;
    }
  }
}

async function main() {
  const app = new RunningCoachApplication();
  process.exitCode = await app.run(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error) => {
    logger.error(`Unexpected failure: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}

export { RunningCoachApplication };
