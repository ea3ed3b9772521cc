import { DimCountryEntity } from './dim-country.entity';
import { DimCustomerEntity } from './dim-customer.entity';
import { DimDateEntity } from './dim-date.entity';
import { DimProductEntity } from './dim-product.entity';
import { FactSalesEntity } from './fact-sales.entity';

export { DimCountryEntity, DimCustomerEntity, DimDateEntity, DimProductEntity, FactSalesEntity };

export const WAREHOUSE_ENTITIES = [
  DimDateEntity,
  DimProductEntity,
  DimCountryEntity,
  DimCustomerEntity,
  FactSalesEntity,
];
