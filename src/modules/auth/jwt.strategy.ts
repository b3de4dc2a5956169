import { ExtractJwt, Strategy } from 'passport-jwt';
import { PassportStrategy } from '@nestjs/passport';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { jwtConfig } from '../../config/jwt.config';
import { UsersService } from '../users/users.service';

// Define the expected shape of the JWT payload
export interface JwtPayload {
  sub: string; // User ID
  email: string;
  iat?: number;
  exp?: number;
}

// Define the shape of the user object attached to the request after JWT validation
export interface AuthenticatedUserContext {
  id: string;
  email: string;
  isAdmin: boolean;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(private usersService: UsersService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: jwtConfig.secret,
    });
  }

  // Reloaded on every request: deactivation and admin changes apply to live tokens
  async validate(payload: JwtPayload): Promise<AuthenticatedUserContext> {
    const user = await this.usersService.findById(payload.sub);
    if (!user || !user.isActive) {
      throw new UnauthorizedException('Could not validate credentials');
    }
    return { id: user.id, email: user.email, isAdmin: user.isAdmin };
  }
}
