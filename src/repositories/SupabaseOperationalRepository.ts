/**
 * Supabase implementation of IOperationalRepository.
 * Read-only queries over the port operations tables.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IOperationalRepository, TimeRange } from './IOperationalRepository.js';
import type {
  ApiEventRow,
  ContainerRow,
  EdiMessageRow,
  VesselAdviceRow,
  VesselRow,
} from '../types/database.js';

/** Upper bound on failed API events pulled into one correlation pass. */
const MAX_API_EVENTS = 500;

export class SupabaseOperationalRepository implements IOperationalRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findContainerVersions(cntrNo: string): Promise<ContainerRow[]> {
    const { data, error } = await this.db
      .from('container')
      .select('*')
      .eq('cntr_no', cntrNo)
      .order('created_at', { ascending: true });

    if (error)
      throw new Error(`Failed to find container versions: ${error.message}`);
    return (data ?? []) as ContainerRow[];
  }

  async findVesselByImo(imoNo: number): Promise<VesselRow | null> {
    const { data, error } = await this.db
      .from('vessel')
      .select('*')
      .eq('imo_no', imoNo)
      .maybeSingle();

    if (error) throw new Error(`Failed to find vessel by IMO: ${error.message}`);
    return data as VesselRow | null;
  }

  async findVesselAdvices(vesselName: string): Promise<VesselAdviceRow[]> {
    const { data, error } = await this.db
      .from('vessel_advice')
      .select('*')
      .eq('vessel_name', vesselName)
      .order('effective_start_datetime', { ascending: true });

    if (error)
      throw new Error(`Failed to find vessel advices: ${error.message}`);
    return (data ?? []) as VesselAdviceRow[];
  }

  async findFailedEdiMessages(
    messageRef: string,
    range: TimeRange
  ): Promise<EdiMessageRow[]> {
    const { data, error } = await this.db
      .from('edi_message')
      .select('*')
      .eq('message_ref', messageRef)
      .eq('status', 'ERROR')
      .gte('sent_at', range.start.toISOString())
      .lte('sent_at', range.end.toISOString())
      .order('sent_at', { ascending: true });

    if (error)
      throw new Error(`Failed to find EDI messages: ${error.message}`);
    return (data ?? []) as EdiMessageRow[];
  }

  async findFailedApiEvents(range: TimeRange): Promise<ApiEventRow[]> {
    const { data, error } = await this.db
      .from('api_event')
      .select('*')
      .gte('http_status', 400)
      .gte('event_ts', range.start.toISOString())
      .lte('event_ts', range.end.toISOString())
      .order('event_ts', { ascending: true })
      .limit(MAX_API_EVENTS);

    if (error) throw new Error(`Failed to find API events: ${error.message}`);
    return (data ?? []) as ApiEventRow[];
  }

  async findApiEventsByCorrelation(
    correlationId: string,
    range: TimeRange
  ): Promise<ApiEventRow[]> {
    const { data, error } = await this.db
      .from('api_event')
      .select('*')
      .eq('correlation_id', correlationId)
      .gte('event_ts', range.start.toISOString())
      .lte('event_ts', range.end.toISOString())
      .order('event_ts', { ascending: true });

    if (error) throw new Error(`Failed to find API events: ${error.message}`);
    return (data ?? []) as ApiEventRow[];
  }
}
