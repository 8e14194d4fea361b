import type { StrategyKind } from "../../config/types.js";
import type { Strategy } from "../types.js";
import { runGroupChat } from "./groupChat.js";
import { runSequential } from "./sequential.js";
import { runSupervisor } from "./supervisor.js";

export const STRATEGIES: Readonly<Record<StrategyKind, Strategy>> = {
  sequential: runSequential,
  group_chat: runGroupChat,
  supervisor: runSupervisor
};

export { runSequential } from "./sequential.js";
export { runGroupChat, keywordTermination } from "./groupChat.js";
export { runSupervisor, routingBrief } from "./supervisor.js";
