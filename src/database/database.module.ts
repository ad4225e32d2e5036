import { Category } from '@/modules/category/entities/category.entity';
import { Link } from '@/modules/link/entities/link.entity';
import { SysSettingItem } from '@/modules/setting/entities/sys-setting-item.entity';
import { SysSetting } from '@/modules/setting/entities/sys-setting.entity';
import { User } from '@/modules/user/entities/user.entity';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

export const ENTITIES = [User, SysSetting, SysSettingItem, Category, Link];

/**
 * MySQL connection built from the `database.*` configuration.
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'mysql',
        host: config.get<string>('database.host', '127.0.0.1'),
        port: config.get<number>('database.port', 3306),
        username: config.get<string>('database.username', 'root'),
        password: config.get<string>('database.password', ''),
        database: config.getOrThrow<string>('database.name'),
        charset: 'utf8mb4',
        entities: ENTITIES,
        synchronize: config.get<boolean>('database.synchronize', false),
        logging: config.get<boolean>('database.logging', false),
      }),
    }),
  ],
})
export class DatabaseModule {}
