import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/**
 * A named settings group. One group per logical type, e.g. site or SMTP.
 */
@Entity('sys_settings')
export class SysSetting {
  @PrimaryGeneratedColumn({ unsigned: true })
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true })
  name!: string;
}
