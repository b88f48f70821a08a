import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { IReportSink, StepReport } from "@homeserver-loadgen/core";

/**
 * Where a step report is stored below `outputDir`: one directory per execution.
 */
export function reportPath(outputDir: string, report: StepReport): string {
	const timestamp = Date.parse(report.timestamp);
	return path.join(outputDir, String(report.executionId), `report_${report.step}_${Number.isNaN(timestamp) ? 0 : timestamp}.json`);
}

/**
 * Local file system sink.
 * Writes each report as JSON below the output directory; a failed write rejects.
 */
export class LocalFileUploader implements IReportSink {
	constructor(private readonly outputDir: string) {}

	async persist(report: StepReport): Promise<string> {
		const file = reportPath(this.outputDir, report);
		await fs.mkdir(path.dirname(file), { recursive: true });
		await fs.writeFile(file, JSON.stringify(report, null, 2));
		return file;
	}
}

/**
 * Get the report sink for a run.
 * Currently only supports the local file system.
 */
export function getUploader(outputDir: string): IReportSink {
	return new LocalFileUploader(outputDir);
}
