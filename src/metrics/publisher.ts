import path from "node:path";
import type { RenderedReport } from "./report.js";
import { CollaboratorUnavailableError, describeError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { writeFileAtomic } from "../utils/atomic-write.js";

const log = createSubsystemLogger("metrics/publisher");

/**
 * Destination for rendered reports. Publication happens after ingestion has
 * been committed and never feeds back into it.
 */
export type ReportPublisher = {
  publish(report: RenderedReport): Promise<void>;
};

/**
 * Writes README.md and metrics.json into a directory, e.g. a checked-out
 * repository that a separate job commits and pushes.
 */
export class FileReportPublisher implements ReportPublisher {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async publish(report: RenderedReport): Promise<void> {
    try {
      await writeFileAtomic(path.join(this.dir, "README.md"), report.markdown);
      await writeFileAtomic(
        path.join(this.dir, "metrics.json"),
        `${JSON.stringify(report.metrics, null, 2)}\n`,
      );
    } catch (err) {
      throw new CollaboratorUnavailableError(
        "publisher",
        `Cannot publish report to ${this.dir}: ${describeError(err)}`,
        { cause: err },
      );
    }
    log.info("Report published", { dir: this.dir });
  }
}
