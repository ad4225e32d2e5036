import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn({ unsigned: true })
  id!: number;

  @Column({ type: 'varchar', length: 30, unique: true })
  username!: string;

  /** argon2 hash, never the plain password. */
  @Column({ type: 'varchar', length: 255 })
  pwd!: string;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  email!: string;

  @Column({ name: 'user_img', type: 'varchar', length: 255, default: '' })
  userImg!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
