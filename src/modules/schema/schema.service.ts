import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { DataSource } from 'typeorm';

export const SCHEMA_FILE = join(__dirname, '..', '..', '..', 'sql', 'schema.sql');

@Injectable()
export class SchemaService {
  private readonly logger = new Logger(SchemaService.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async run(file = SCHEMA_FILE) {
    const sql = await readFile(file, 'utf-8');
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      await queryRunner.query(sql);
      await queryRunner.commitTransaction();
      this.logger.log(`Applied schema from ${file}`);
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
