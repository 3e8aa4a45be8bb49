import { deepFreeze } from "./freeze.js";

export const TEAM_TYPES = ["engineering", "qa"] as const;

export type TeamType = (typeof TEAM_TYPES)[number];

export interface TeamDescriptor {
  id: string;
  name: string;
  shortCode: string;
  type: TeamType;
  /** Only engineering teams are benchmarked against each other. */
  comparable: boolean;
  description: string;
  color: string;
  focusAreas: readonly string[];
}

export interface TeamTypeInfo {
  id: TeamType;
  name: string;
  description: string;
  comparable: boolean;
}

export const TEAM_TYPE_INFO: readonly TeamTypeInfo[] = deepFreeze([
  {
    id: "engineering",
    name: "Engineering Teams",
    description: "Software development and engineering teams",
    comparable: true,
  },
  {
    id: "qa",
    name: "Quality Assurance Teams",
    description:
      "QA and testing teams, tracked separately from engineering squads",
    comparable: false,
  },
] satisfies TeamTypeInfo[]);

export const ACTIVE_TEAMS: readonly TeamDescriptor[] = deepFreeze([
  {
    id: "analytics",
    name: "Analytics",
    shortCode: "Aly",
    type: "engineering",
    comparable: true,
    description: "Analytics and data engineering team",
    color: "#DC143C",
    focusAreas: ["data analytics", "business intelligence", "data engineering"],
  },
  {
    id: "cfd_titans",
    name: "CFD (Titans)",
    shortCode: "CFD",
    type: "engineering",
    comparable: true,
    description: "CFD Titans engineering team",
    color: "#32CD32",
    focusAreas: ["client focus delivery", "support"],
  },
  {
    id: "core_crm",
    name: "Core CRM",
    shortCode: "CC",
    type: "engineering",
    comparable: true,
    description: "Core CRM platform team",
    color: "#4169E1",
    focusAreas: ["customer relationship management", "core platform"],
  },
  {
    id: "integrations_synergy",
    name: "Integrations (Synergy)",
    shortCode: "I",
    type: "engineering",
    comparable: true,
    description: "Integrations and Synergy team",
    color: "#FF8C00",
    focusAreas: [
      "system integrations",
      "api development",
      "third-party connections",
    ],
  },
  {
    id: "media",
    name: "Media",
    shortCode: "Med",
    type: "engineering",
    comparable: true,
    description: "Media and content management team",
    color: "#00BFFF",
    focusAreas: ["media processing", "content management", "digital assets"],
  },
  {
    id: "shinsei",
    name: "Shinsei",
    shortCode: "S",
    type: "engineering",
    comparable: true,
    description: "Shinsei development team",
    color: "#DA70D6",
    focusAreas: ["new product development", "innovation"],
  },
  {
    id: "qa_automation",
    name: "QA-Automation",
    shortCode: "QA",
    type: "qa",
    comparable: false,
    description: "Quality Assurance and Test Automation team",
    color: "#FFD700",
    focusAreas: ["test automation", "quality assurance", "testing frameworks"],
  },
] satisfies TeamDescriptor[]);
