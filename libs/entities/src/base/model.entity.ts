import { PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

export abstract class Model {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @UpdateDateColumn({ name: 'updated_at', select: false })
  updatedAt!: Date;
}
