import {
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

export enum CategoryType {
  ARTICLE = 0,
  LINK = 1,
}

/**
 * Self-referential hierarchy node shared by articles and friend-links.
 * Soft-deleted rows keep their id so links and children still resolve them.
 */
@Entity('categories')
export class Category {
  @PrimaryGeneratedColumn({ unsigned: true })
  id!: number;

  @Column({ type: 'tinyint', unsigned: true, default: CategoryType.ARTICLE })
  type!: CategoryType;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  /** Only article categories have a URL slug. */
  @Column({ type: 'varchar', length: 255, nullable: true })
  url!: string | null;

  @Column({ name: 'parent_id', type: 'int', unsigned: true, nullable: true })
  parentId!: number | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @DeleteDateColumn({ name: 'deleted_at' })
  deletedAt!: Date | null;
}
