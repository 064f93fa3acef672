import type { EntityMention } from './EntityMention.js';

export interface Facility {
  name: string;
  unit?: string;
}

export interface IncidentRecord {
  incidentId: string;
  narrative: string;
  title?: string;
  eventDate?: string;
  facility?: Facility;
  system?: string;
  mentions: EntityMention[];
}
