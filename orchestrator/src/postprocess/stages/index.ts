import { StageFactory } from "../stage";
import { createAddColumnsStage } from "./addColumns";
import { createDeduplicateStage } from "./deduplicate";
import { createFilterStage } from "./filter";
import { createRemoveHeadersStage } from "./removeHeaders";
import { createTransformStage } from "./transform";
import { createValidateStage } from "./validate";

export const builtinStages: Record<string, StageFactory> = {
  filter: createFilterStage,
  transform: createTransformStage,
  validate: createValidateStage,
  deduplicate: createDeduplicateStage,
  remove_headers: createRemoveHeadersStage,
  add_columns: createAddColumnsStage,
};

export {
  createAddColumnsStage,
  createDeduplicateStage,
  createFilterStage,
  createRemoveHeadersStage,
  createTransformStage,
  createValidateStage,
};
