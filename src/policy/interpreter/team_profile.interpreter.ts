import fs from "node:fs";
import path from "node:path";
import { deepFreeze } from "../../core/_shared/utils/snapshot";
import { ConfigurationError } from "../../core/errors/configuration.error";
import type { TeamDefinition } from "../../core/routing/routing.types";
import type { DemoStep, TeamProfile, TriggerDefinition } from "../schema/team.types";
import { validateDemoFile, validateTeamFile, validateTriggersFile } from "./team.validator";
import { loadYamlFile } from "./yaml.loader";

export interface TeamProfileInterpreterOptions {
  repoRoot: string;
  profile: string;
}

function loadProfileFile(absPath: string): unknown {
  try {
    return loadYamlFile(absPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`CONFIGURATION_ERROR ${message}`, { cause: error });
  }
}

/**
 * Reads `policy/profiles/<profile>/` under the repo root: `team.yaml` and
 * `triggers.yaml` are required, `demo.yaml` is optional.
 */
export class TeamProfileInterpreter {
  readonly profileRoot: string;
  readonly profile: string;
  private readonly team: TeamDefinition;
  private readonly triggers: readonly TriggerDefinition[];
  private readonly demo: readonly DemoStep[];

  constructor(opts: TeamProfileInterpreterOptions) {
    this.profile = opts.profile.trim();
    if (this.profile === "") {
      throw new ConfigurationError("CONFIGURATION_ERROR profile must not be empty");
    }

    this.profileRoot = path.join(opts.repoRoot, "policy", "profiles", this.profile);
    if (!fs.existsSync(this.profileRoot) || !fs.statSync(this.profileRoot).isDirectory()) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR ${this.profileRoot}: profile directory does not exist`
      );
    }

    const teamPath = path.join(this.profileRoot, "team.yaml");
    const triggersPath = path.join(this.profileRoot, "triggers.yaml");
    const demoPath = path.join(this.profileRoot, "demo.yaml");

    this.team = validateTeamFile(loadProfileFile(teamPath), teamPath);
    this.triggers = validateTriggersFile(loadProfileFile(triggersPath), triggersPath);
    this.demo = fs.existsSync(demoPath)
      ? validateDemoFile(loadProfileFile(demoPath), demoPath)
      : [];

    const intents = new Set(
      [this.team.coordinator, ...this.team.specialists].map((handler) => handler.intent)
    );
    this.triggers.forEach((trigger, idx) => {
      if (!intents.has(trigger.intent)) {
        throw new ConfigurationError(
          `CONFIGURATION_ERROR ${triggersPath}: triggers[${idx}].intent '${trigger.intent}' is not served by any handler`
        );
      }
    });
  }

  getTeam(): TeamDefinition {
    return this.team;
  }

  getTriggers(): readonly TriggerDefinition[] {
    return this.triggers;
  }

  getDemo(): readonly DemoStep[] {
    return this.demo;
  }

  toProfile(): TeamProfile {
    const profile: TeamProfile = {
      name: this.profile,
      team: this.team,
      triggers: this.triggers,
      demo: this.demo,
    };
    return deepFreeze(profile);
  }
}
