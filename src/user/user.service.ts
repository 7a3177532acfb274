import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, UpdateQuery } from 'mongoose';
import { User, UserDocument } from './schemas/user.schema';

export type NewUser = Pick<User, 'email' | 'hashedPassword' | 'nickname'> &
  Partial<Pick<User, 'profileImage' | 'preferences' | 'preferredRegion' | 'preferredTheme' | 'bio'>>;

@Injectable()
export class UserService {
  constructor(@InjectModel(User.name) private userModel: Model<User>) {}

  async create(data: NewUser): Promise<UserDocument> {
    return this.userModel.create(data);
  }

  async findOneByEmail(email: string): Promise<UserDocument | null> {
    return this.userModel.findOne({ email: email.toLowerCase() }).exec();
  }

  async findOneByNickname(nickname: string): Promise<UserDocument | null> {
    return this.userModel.findOne({ nickname }).exec();
  }

  async findOneById(id: string): Promise<UserDocument | null> {
    return this.userModel.findById(id).exec();
  }

  async update(userId: string, updateData: Partial<User>): Promise<UserDocument> {
    return this.applyUpdate(userId, { $set: updateData });
  }

  async recordLogin(userId: string): Promise<UserDocument> {
    return this.applyUpdate(userId, { $set: { lastLogin: new Date() }, $inc: { loginCount: 1 } });
  }

  async addFavoriteCity(userId: string, city: string): Promise<UserDocument> {
    return this.applyUpdate(userId, { $addToSet: { favoriteCities: city } });
  }

  async removeFavoriteCity(userId: string, city: string): Promise<UserDocument> {
    return this.applyUpdate(userId, { $pull: { favoriteCities: city } });
  }

  private async applyUpdate(userId: string, update: UpdateQuery<User>): Promise<UserDocument> {
    const updated = await this.userModel.findByIdAndUpdate(userId, update, { new: true }).exec();
    if (!updated) {
      throw new NotFoundException('사용자를 찾을 수 없습니다.');
    }
    return updated;
  }
}
