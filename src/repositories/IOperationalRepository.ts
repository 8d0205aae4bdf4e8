/**
 * Read-only access to the operational tables the correlator cross-references.
 */

import type {
  ApiEventRow,
  ContainerRow,
  EdiMessageRow,
  VesselAdviceRow,
  VesselRow,
} from '../types/database.js';

export interface TimeRange {
  start: Date;
  end: Date;
}

export interface IOperationalRepository {
  /** Every version of a container number, oldest first. */
  findContainerVersions(cntrNo: string): Promise<ContainerRow[]>;

  findVesselByImo(imoNo: number): Promise<VesselRow | null>;

  /** Advices for a vessel name, oldest first. */
  findVesselAdvices(vesselName: string): Promise<VesselAdviceRow[]>;

  /** EDI messages in ERROR status with this reference, sent inside the range. */
  findFailedEdiMessages(messageRef: string, range: TimeRange): Promise<EdiMessageRow[]>;

  /** API events with HTTP status >= 400 inside the range, oldest first. */
  findFailedApiEvents(range: TimeRange): Promise<ApiEventRow[]>;

  /** API events sharing a correlation id inside the range, oldest first. */
  findApiEventsByCorrelation(correlationId: string, range: TimeRange): Promise<ApiEventRow[]>;
}
