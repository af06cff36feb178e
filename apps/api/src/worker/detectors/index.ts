import type {
  DetectorInitPayload,
  PoseDetector,
} from "../../shared/types/detector";
import { createBlazePoseDetector } from "./blazePoseDetector";
import { createFixtureDetector } from "./fixtureDetector";

const createDetector = (payload: DetectorInitPayload): PoseDetector => {
  switch (payload.kind) {
    case "blazepose":
      return createBlazePoseDetector(payload);
    case "fixture":
      return createFixtureDetector(payload);
    default:
      throw new Error(`Unknown detector kind: ${String(payload.kind)}`);
  }
};

export default createDetector;
