import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { DimDateEntity } from './dim-date.entity';
import { DimProductEntity } from './dim-product.entity';
import { DimCustomerEntity } from './dim-customer.entity';
import { DimCountryEntity } from './dim-country.entity';
import { FactSalesRow } from '../warehouse.types';

@Entity('fact_sales')
// Dashboard slicing: by period, by product, by market
@Index(['date_key'])
@Index(['product_key'])
@Index(['customer_key'])
@Index(['country_key'])
export class FactSalesEntity implements FactSalesRow {
  @PrimaryColumn({ type: 'integer' })
  sales_key!: number;

  @Column({ type: 'integer' })
  date_key!: number;

  @Column({ type: 'integer' })
  product_key!: number;

  @Column({ type: 'integer' })
  customer_key!: number;

  @Column({ type: 'integer' })
  country_key!: number;

  @Column({ type: 'text' })
  invoice_no!: string;

  @Column({ type: 'text' })
  invoice_datetime!: string;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ type: 'real' })
  unit_price!: number;

  @Column({ type: 'real' })
  net_amount!: number;

  @Column({ type: 'boolean' })
  is_return!: boolean;

  @ManyToOne(() => DimDateEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'date_key' })
  date?: DimDateEntity;

  @ManyToOne(() => DimProductEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'product_key' })
  product?: DimProductEntity;

  @ManyToOne(() => DimCustomerEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'customer_key' })
  customer?: DimCustomerEntity;

  @ManyToOne(() => DimCountryEntity, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'country_key' })
  country?: DimCountryEntity;
}
