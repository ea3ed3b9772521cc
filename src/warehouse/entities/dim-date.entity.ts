import { Column, Entity, PrimaryColumn } from 'typeorm';
import { DimDateRow } from '../warehouse.types';

@Entity('dim_date')
export class DimDateEntity implements DimDateRow {
  @PrimaryColumn({ type: 'integer' })
  date_key!: number;

  @Column({ type: 'text', unique: true })
  full_date!: string;

  @Column({ type: 'integer' })
  year!: number;

  @Column({ type: 'integer' })
  month!: number;

  @Column({ type: 'integer' })
  day!: number;

  @Column({ type: 'integer' })
  weekday!: number;

  @Column({ type: 'text' })
  weekday_name!: string;

  @Column({ type: 'text' })
  month_name!: string;

  @Column({ type: 'integer' })
  quarter!: number;
}
