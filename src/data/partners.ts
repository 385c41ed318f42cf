import type { PartnerRecordT } from '../schemas/partner.js';

export const SEED_PARTNERS: readonly PartnerRecordT[] = Object.freeze([
  { id: 'BP001', name: 'Acme Corp', city: 'New York', country: 'USA' },
  { id: 'BP002', name: 'TechVentures GmbH', city: 'Berlin', country: 'Germany' },
  { id: 'BP003', name: 'Global Innovations Ltd', city: 'London', country: 'UK' },
  { id: 'BP004', name: 'Pacific Solutions', city: 'Tokyo', country: 'Japan' },
  { id: 'BP005', name: 'Nordic Systems AB', city: 'Stockholm', country: 'Sweden' },
  { id: 'BP006', name: 'Alpine Technologies SA', city: 'Zurich', country: 'Switzerland' },
  { id: 'BP007', name: 'Southern Cross Enterprises', city: 'Sydney', country: 'Australia' },
  { id: 'BP008', name: 'Maple Leaf Industries', city: 'Toronto', country: 'Canada' },
  { id: 'BP009', name: 'Dragon Tech Co', city: 'Shanghai', country: 'China' },
  { id: 'BP010', name: 'Sunset Digital', city: 'San Francisco', country: 'USA' },
].map((p) => Object.freeze(p)));
