#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import dotenv from "dotenv";
import { loadConfig } from "./config/config";
import { JiraService } from "./services/jira-service";
import { FieldService } from "./services/field-service";
import { AggregationService } from "./services/aggregation-service";
import { WrappedService } from "./services/wrapped-service";
import { displayError, displayWrappedSummary } from "./utils/display-utils";
import { ConsoleLogger } from "./utils/logger";
import { SpinnerConsole } from "./utils/spinner";
import { exitCodeFor } from "./utils/errors";

// Load environment variables
dotenv.config();

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("jira-wrapped")
  .description(
    "Summarize your Jira activity over the last WRAPPED_TIMELINE days.\n" +
      "All settings come from the environment or a .env file."
  )
  .version("1.0.0")
  .action(async () => {
    try {
      // Fails before any network call when misconfigured
      const config = loadConfig();
      const output = new SpinnerConsole();
      const logger = new ConsoleLogger(config.app.debug, (line) =>
        output.writeLine(line)
      );

      // Initialize all services with dependency injection
      const jiraService = new JiraService(config.jira, logger);
      const fieldService = new FieldService(jiraService, logger);
      const wrappedService = new WrappedService(
        config,
        jiraService,
        fieldService,
        new AggregationService(),
        logger
      );

      logger.info(`🚀 Generating Jira Wrapped for ${config.jira.username}...`);

      const fieldSpinner = ora("Resolving custom fields...").start();
      const fieldMap = await output.run(fieldSpinner, () =>
        wrappedService.resolveFields()
      );
      fieldSpinner.succeed(`Resolved ${fieldMap.size} custom field(s)`);

      const issueSpinner = ora("Fetching Jira issues...").start();
      const issues = await output.run(issueSpinner, () =>
        wrappedService.fetchIssues(fieldMap)
      );
      issueSpinner.succeed(`Fetched ${chalk.green(issues.length)} issues`);

      const epicSpinner = ora("Looking up epics...").start();
      const epicNames = await output.run(epicSpinner, () =>
        wrappedService.resolveEpics(issues, fieldMap)
      );
      epicSpinner.succeed(`Found ${epicNames.size} linked epic(s)`);

      displayWrappedSummary(
        wrappedService.summarize(issues, fieldMap, epicNames),
        {
          verbose: config.report.verbose,
          lineLength: config.report.lineLength,
        }
      );
    } catch (error) {
      displayError(
        error instanceof Error ? error.message : "Unknown error",
        error instanceof Error ? error : undefined
      );
      process.exit(exitCodeFor(error));
    }
  });

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  displayError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
