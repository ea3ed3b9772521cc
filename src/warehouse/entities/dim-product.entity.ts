import { Column, Entity, PrimaryColumn } from 'typeorm';
import { DimProductRow } from '../warehouse.types';

@Entity('dim_product')
export class DimProductEntity implements DimProductRow {
  @PrimaryColumn({ type: 'integer' })
  product_key!: number;

  @Column({ type: 'text', unique: true })
  stock_code!: string;

  @Column({ type: 'text', default: '' })
  description!: string;
}
