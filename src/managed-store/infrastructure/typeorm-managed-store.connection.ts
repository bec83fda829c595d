import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  ManagedStoreConnection,
  ManagedStoreRow,
} from '../ports/managed-store-connection.port';
import { MANAGED_STORE_DATA_SOURCE } from './managed-store-typeorm-config.service';

function isRow(value: unknown): value is ManagedStoreRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class TypeOrmManagedStoreConnection extends ManagedStoreConnection {
  constructor(
    @InjectDataSource(MANAGED_STORE_DATA_SOURCE)
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  async execute(sql: string): Promise<void> {
    await this.dataSource.query(sql);
  }

  async query(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<ManagedStoreRow[]> {
    const result: unknown = await this.dataSource.query(sql, [...params]);
    return Array.isArray(result) ? result.filter(isRow) : [];
  }

  async update(sql: string, params: readonly unknown[]): Promise<number> {
    const result: unknown = await this.dataSource.query(sql, [...params]);
    if (
      isRow(result) &&
      'affectedRows' in result &&
      typeof result.affectedRows === 'number'
    ) {
      return result.affectedRows;
    }
    return 0;
  }
}
