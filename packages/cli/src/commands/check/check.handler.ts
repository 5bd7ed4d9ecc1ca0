/**
 * Check Command Handler
 *
 * Looks up both resources, runs the reachability check and prints the
 * outcome. Returns the process exit code instead of exiting so it can be
 * driven from tests.
 */

import {
  EXIT_CODES,
  checkReachability,
  describeResource,
  isLookupError,
  type DestinationDescriptor,
  type ExitCode,
  type IDestinationLookupService,
  type ISecurityGroupRulesService,
  type ISourceLookupService,
  type ReachabilityReport,
  type ResourceDescriptor,
  type SourceDescriptor,
} from "@reachcheck/core";
import type { CheckRequest } from "../../config";
import type { IOutputService } from "../../interfaces/output.interface";

export type ResourceLookupService = ISourceLookupService & IDestinationLookupService;

export class CheckHandler {
  /**
   * @param output - Output service for display
   * @param resources - Source and destination lookups
   * @param securityGroups - Security group rule lookups
   * @param log - Verbose progress sink passed to the reachability check
   */
  constructor(
    private readonly output: IOutputService,
    private readonly resources: ResourceLookupService,
    private readonly securityGroups: ISecurityGroupRulesService,
    private readonly log?: (message: string) => void
  ) {}

  async execute(request: CheckRequest): Promise<ExitCode> {
    try {
      return await this.run(request);
    } catch (error) {
      this.output.failSpinner();
      return this.reportError(error, request);
    }
  }

  private async run(request: CheckRequest): Promise<ExitCode> {
    this.output.startSpinner("loading service information");
    const [source, destination] = await Promise.all([
      this.resources.lookupSource(request.source.type, request.source.name),
      this.resources.lookupDestination(request.destination),
    ]);
    this.output.succeedSpinner("loading service information");
    this.printEndpoints(source, destination, request.verbose);

    this.output.startSpinner("checking VPC connectivity");
    const report = await checkReachability({
      source,
      destination,
      port: request.port,
      securityGroups: this.securityGroups,
      log: this.log,
    });

    if (report.status === "different-vpc") {
      this.output.failSpinner("checking VPC connectivity");
    } else {
      this.output.succeedSpinner("checking VPC connectivity");
      this.output.startSpinner("checking security groups");
      if (report.status === "reachable") {
        this.output.succeedSpinner("checking security groups");
      } else {
        this.output.failSpinner("checking security groups");
      }
    }

    this.printReport(report, request);
    return report.status === "reachable" ? EXIT_CODES.REACHABLE : EXIT_CODES.NOT_REACHABLE;
  }

  private printEndpoints(
    source: SourceDescriptor,
    destination: DestinationDescriptor,
    verbose: boolean
  ): void {
    this.output.dim(`from: ${describePlacement(source, verbose)}`);
    this.output.dim(`to:   ${describePlacement(destination, verbose)}`);
  }

  private printReport(report: ReachabilityReport, request: CheckRequest): void {
    if (request.json) {
      this.output.json({
        status: report.status,
        port: report.port,
        source: report.source,
        destination: report.destination,
        messages: report.messages,
        evaluation: report.evaluation?.toJSON(),
      });
      return;
    }

    for (const message of report.messages) {
      const line = `* ${message}`;
      if (report.status === "reachable") {
        this.output.success(line);
      } else if (report.status === "inconclusive") {
        this.output.warn(line);
      } else {
        this.output.error(line);
      }
    }
    if (report.status === "inconclusive" && report.messages.length === 0) {
      this.output.warn(`* no ingress rule allows connections on port ${report.port}`);
    }
  }

  private reportError(error: unknown, request: CheckRequest): ExitCode {
    const message = error instanceof Error ? error.message : String(error);
    const lookupFailed = isLookupError(error);

    if (request.json) {
      this.output.json({ status: lookupFailed ? "lookup-failed" : "error", error: message });
    } else {
      this.output.error(lookupFailed ? message : `unexpected error: ${message}`);
    }
    return lookupFailed ? EXIT_CODES.LOOKUP_FAILED : EXIT_CODES.UNEXPECTED_ERROR;
  }
}

function describePlacement(resource: ResourceDescriptor, verbose: boolean): string {
  const summary = `${describeResource(resource)} (${resource.vpcId}, ${resource.cidr})`;
  if (!verbose) {
    return summary;
  }
  const zone = resource.availabilityZone ?? "unknown zone";
  const routeTable = resource.routeTableId ?? "no route table";
  const gateway = resource.defaultGateway ?? "no default route";
  return `${summary} in ${zone}, ${routeTable} -> ${gateway}`;
}

/**
 * Factory function for creating a check handler with services.
 */
export function createCheckHandler(
  output: IOutputService,
  resources: ResourceLookupService,
  securityGroups: ISecurityGroupRulesService,
  log?: (message: string) => void
): CheckHandler {
  return new CheckHandler(output, resources, securityGroups, log);
}
