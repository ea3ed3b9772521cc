import { Column, Entity, PrimaryColumn } from 'typeorm';
import { DimCountryRow } from '../warehouse.types';

@Entity('dim_country')
export class DimCountryEntity implements DimCountryRow {
  @PrimaryColumn({ type: 'integer' })
  country_key!: number;

  @Column({ type: 'text', unique: true })
  country!: string;
}
