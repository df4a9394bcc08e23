import type { ISODate } from "../shared/dates.js";

export type CampaignCode = string;

export type GameInfo = {
  code: CampaignCode;
  name: string;
  depositAmount: number;
  tokenSymbol: string;
  startDate: string; // display form, e.g. "2026/01/02"
  endDate: string;
  stepTarget: number;
  totalPlayers: number;
  link: string;
};

export type CompletionStatus =
  | { type: "NOT_YET_DUE" }
  | { type: "COMPLETE"; requiredDays: number }
  | { type: "PARTIAL"; completedDays: number; requiredDays: number }; // completedDays < requiredDays

export type CampaignDays = ISODate[];
