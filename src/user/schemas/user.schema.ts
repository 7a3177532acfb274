import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { UserRole } from '../../common/interfaces/authenticated-request.interface';

export type UserDocument = HydratedDocument<User>;

@Schema({
  timestamps: true,
  toJSON: { virtuals: true },
  toObject: { virtuals: true },
})
export class User {
  _id!: Types.ObjectId;

  @Prop({ type: String, required: true, unique: true, index: true, lowercase: true, trim: true })
  email!: string;

  @Prop({ type: String, required: true })
  hashedPassword!: string;

  @Prop({ type: String, required: true, unique: true, trim: true })
  nickname!: string;

  @Prop({ type: String, default: null })
  profileImage?: string | null;

  /**
   * Preference tags in the same form as destination tags, e.g. "#카페".
   */
  @Prop({ type: [String], default: [] })
  preferences!: string[];

  @Prop({ type: String, default: null })
  preferredRegion?: string | null;

  @Prop({ type: String, default: null })
  preferredTheme?: string | null;

  @Prop({ type: String, default: null })
  bio?: string | null;

  // Cities the weather favorites endpoints operate on
  @Prop({ type: [String], default: [] })
  favoriteCities!: string[];

  @Prop({ type: Boolean, default: true })
  isActive!: boolean;

  @Prop({ type: String, enum: ['USER', 'ADMIN'], default: 'USER' })
  role!: UserRole;

  @Prop({ type: Date, default: null })
  lastLogin?: Date | null;

  @Prop({ type: Number, default: 0 })
  loginCount!: number;

  createdAt?: Date;
  updatedAt?: Date;
}

export const UserSchema = SchemaFactory.createForClass(User);

UserSchema.virtual('id').get(function () {
  return this._id.toHexString();
});
