export const EQUIPMENT_CATEGORIES = [
  'destroyer_guns',
  'light_cruiser_guns',
  'heavy_cruiser_guns',
  'large_cruiser_guns',
  'battleship_guns',
  'anti_air_guns',
  'ship_torpedoes',
  'submarine_torpedoes',
  'fighters',
  'dive_bombers',
  'torpedo_bombers',
  'seaplanes',
  'auxiliary_equipment',
  'augment_modules',
  'anti_submarine_equipment'
] as const;

export type EquipmentCategory = (typeof EQUIPMENT_CATEGORIES)[number];

export type DataCompleteness = 'basic' | 'partial' | 'complete';

export interface EquipmentIdentity {
  name: string;
  id?: number;
  rarity?: string;
  category: EquipmentCategory;
  faction?: string;
}

export interface EquipmentSource {
  methods?: string[];
  craftable?: boolean;
}

export interface EquipmentStatsNumerical {
  firepower?: number;
  torpedo?: number;
  antiAir?: number;
  aviation?: number;
  reload?: number;
  damage?: number;
  rateOfFire?: number;
  range?: number;
  firingAngle?: number;
  spread?: number;
  projectileSpeed?: number;
  volley?: number;
  hp?: number;
  accuracy?: number;
  evasion?: number;
  antiSub?: number;
  oxygen?: number;
  tech?: number;
}

export interface EquipmentStatsQualitative {
  ammoType?: string;
  damageType?: string;
  description?: string;
  speciality?: string;
  projectilePattern?: string;
  appearance?: string;
}

export interface EquipmentAnalysis {
  primaryRoles?: string[];
  strengths?: string[];
  weaknesses?: string[];
  notes?: string;
  tier?: string;
}

export interface EquipmentMetadata {
  lastUpdated: string;
  dataCompleteness: DataCompleteness;
  sources: string[];
}

export interface EquipmentRecord {
  identity: EquipmentIdentity;
  source: EquipmentSource;
  stats_numerical: EquipmentStatsNumerical;
  stats_qualitative_visual: EquipmentStatsQualitative;
  derived_analysis: EquipmentAnalysis;
  metadata: EquipmentMetadata;
}

/** Identity fields a source may fill in; name and category always come from the work item. */
export type IdentityOverrides = Partial<Pick<EquipmentIdentity, 'id' | 'rarity' | 'faction'>>;

export interface RecordFragment {
  identity?: IdentityOverrides;
  source?: EquipmentSource;
  stats_numerical?: EquipmentStatsNumerical;
  stats_qualitative_visual?: EquipmentStatsQualitative;
  derived_analysis?: EquipmentAnalysis;
}

export interface WorkItem {
  name: string;
  category: EquipmentCategory;
}

export function isEquipmentCategory(value: unknown): value is EquipmentCategory {
  return typeof value === 'string' && EQUIPMENT_CATEGORIES.some((category) => category === value);
}
