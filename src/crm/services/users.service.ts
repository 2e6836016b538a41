import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TelegramUser } from '@common/entities/telegram-user.entity';
import type { TelegramProfile } from '../interfaces/customer-request.interface';

@Injectable()
export class UsersService {
  constructor(@InjectRepository(TelegramUser) private readonly usersRepository: Repository<TelegramUser>) {}

  /** Creates the user on first contact, refreshes profile fields and last activity afterwards. */
  async touch(profile: TelegramProfile): Promise<TelegramUser> {
    const user =
      (await this.usersRepository.findOneBy({ telegramUserId: profile.id })) ??
      this.usersRepository.create({ telegramUserId: profile.id });

    user.username = profile.username ?? null;
    user.firstName = profile.firstName ?? null;
    user.lastName = profile.lastName ?? null;
    user.lastActive = new Date();

    return this.usersRepository.save(user);
  }

  async findByTelegramId(telegramUserId: string): Promise<TelegramUser | null> {
    return this.usersRepository.findOneBy({ telegramUserId });
  }

  async count(): Promise<number> {
    return this.usersRepository.count();
  }
}
