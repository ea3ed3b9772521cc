import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { DimCountryEntity } from './dim-country.entity';
import { DimCustomerRow } from '../warehouse.types';

@Entity('dim_customer')
@Index(['country_key'])
export class DimCustomerEntity implements DimCustomerRow {
  @PrimaryColumn({ type: 'integer' })
  customer_key!: number;

  // NULL only on the unknown-customer row
  @Column({ type: 'text', nullable: true, unique: true })
  customer_id!: string | null;

  @Column({ type: 'integer', nullable: true })
  country_key!: number | null;

  @Column({ type: 'boolean', default: false })
  is_unknown!: boolean;

  @ManyToOne(() => DimCountryEntity, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'country_key' })
  country?: DimCountryEntity;
}
