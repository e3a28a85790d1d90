import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import { activeIdentifier, StudentAccount } from '../students/entities/student-account.entity';
import { JwtPayload } from './auth.types';

@Injectable()
export class SessionService {
  constructor(private readonly jwtService: JwtService) {}

  issue(account: StudentAccount): Promise<string> {
    const payload: JwtPayload = {
      sub: account.id,
      username: activeIdentifier(account),
      credential_type: account.activeCredentialType,
      role: 'student',
    };
    return this.jwtService.signAsync(payload);
  }
}
