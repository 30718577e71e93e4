import { Body, Controller, Get, Inject, Param, Post, Put, Query } from '@nestjs/common';

import { CallerAddress } from '../common/decorators/caller-address.decorator';
import { IotaKeyringService } from '../iota/iota.service';
import { AddMaintenanceRecordDto } from './dto/add-maintenance-record.dto';
import { AuthorizeMechanicDto } from './dto/authorize-mechanic.dto';
import { CreateInsurancePolicyDto } from './dto/create-insurance-policy.dto';
import { CreateWalletDto } from './dto/create-wallet.dto';
import { ListPrincipalsQuery } from './dto/list-principals.query';
import { RecordInteractionDto } from './dto/record-interaction.dto';
import { RegisterPrincipalDto } from './dto/register-principal.dto';
import { RegisterRoadsideUnitDto } from './dto/register-roadside-unit.dto';
import { RegisterVehicleDto } from './dto/register-vehicle.dto';
import { StoreCredentialDto } from './dto/store-credential.dto';
import { StoreDidDocumentDto } from './dto/store-did-document.dto';
import { TransferOwnershipDto } from './dto/transfer-ownership.dto';
import { UpdateVehicleConfigDto } from './dto/update-vehicle-config.dto';
import { RegistryService } from './registry.service';

@Controller()
export class RegistryController {
  constructor(
    @Inject(RegistryService) private readonly registry: RegistryService,
    @Inject(IotaKeyringService) private readonly keyring: IotaKeyringService,
  ) {}

  @Get('config')
  getConfig() {
    return {
      ...this.keyring.getConfigSnapshot(),
      sequence: this.registry.sequence,
    };
  }

  @Post('wallets')
  createWallet(@Body() dto: CreateWalletDto) {
    return this.registry.onboard(this.keyring.allocateWallet(), dto);
  }

  // --- principals ---

  @Post('principals')
  registerPrincipal(@CallerAddress() caller: string | undefined, @Body() dto: RegisterPrincipalDto) {
    return this.registry.registerPrincipal(this.keyring.resolveCaller(caller), dto);
  }

  @Get('principals')
  listPrincipals(@Query() query: ListPrincipalsQuery) {
    return this.registry.listPrincipals(query.role);
  }

  @Post('roadside-units')
  registerRoadsideUnit(@CallerAddress() caller: string | undefined, @Body() dto: RegisterRoadsideUnitDto) {
    return this.registry.registerRoadsideUnit(this.keyring.resolveCaller(caller), dto);
  }

  @Get('roadside-units')
  listRoadsideUnits() {
    return this.registry.listRoadsideUnits();
  }

  @Post('roadside-units/deactivate')
  deactivateRoadsideUnit(@CallerAddress() caller: string | undefined) {
    return this.registry.deactivateRoadsideUnit(this.keyring.resolveCaller(caller));
  }

  // --- DIDs ---

  @Get('dids/:did')
  resolveDid(@Param('did') did: string) {
    return this.registry.resolveDid(did);
  }

  @Get('dids/:did/document')
  getDidDocument(@Param('did') did: string) {
    return this.registry.getDIDDocument(did);
  }

  @Put('dids/:did/document')
  storeDidDocument(
    @CallerAddress() caller: string | undefined,
    @Param('did') did: string,
    @Body() dto: StoreDidDocumentDto,
  ) {
    return this.registry.storeDIDDocument(this.keyring.resolveCaller(caller), did, dto.document);
  }

  @Post('dids/:did/revoke')
  revokeDidDocument(@CallerAddress() caller: string | undefined, @Param('did') did: string) {
    return this.registry.revokeDIDDocument(this.keyring.resolveCaller(caller), did);
  }

  // --- vehicles ---

  @Post('vehicles')
  registerVehicle(@CallerAddress() caller: string | undefined, @Body() dto: RegisterVehicleDto) {
    return this.registry.registerVehicle(this.keyring.resolveCaller(caller), dto);
  }

  @Put('vehicles/by-wallet/:did/config')
  updateVehicleConfig(
    @CallerAddress() caller: string | undefined,
    @Param('did') vehicleWalletDID: string,
    @Body() dto: UpdateVehicleConfigDto,
  ) {
    return this.registry.updateVehicleConfig(this.keyring.resolveCaller(caller), vehicleWalletDID, dto.config);
  }

  @Get('vehicles/:vin')
  getVehicle(@Param('vin') vin: string) {
    return this.registry.getVehicle(vin);
  }

  @Get('owners/:did/vehicles')
  getVehiclesByOwner(@Param('did') ownerDID: string) {
    return this.registry.getVehiclesByOwnerDID(ownerDID);
  }

  @Post('vehicles/:vin/transfer')
  transferOwnership(
    @CallerAddress() caller: string | undefined,
    @Param('vin') vin: string,
    @Body() dto: TransferOwnershipDto,
  ) {
    return this.registry.transferOwnership(this.keyring.resolveCaller(caller), vin, dto.newOwner);
  }

  @Post('vehicles/:vin/mechanics')
  authorizeMechanic(
    @CallerAddress() caller: string | undefined,
    @Param('vin') vin: string,
    @Body() dto: AuthorizeMechanicDto,
  ) {
    return this.registry.authorizeMechanic(this.keyring.resolveCaller(caller), vin, dto.mechanic);
  }

  @Post('vehicles/:vin/maintenance')
  addMaintenanceRecord(
    @CallerAddress() caller: string | undefined,
    @Param('vin') vin: string,
    @Body() dto: AddMaintenanceRecordDto,
  ) {
    return this.registry.addMaintenanceRecord(this.keyring.resolveCaller(caller), vin, dto.description, dto.critical);
  }

  @Get('vehicles/:vin/maintenance/:mechanic')
  getMaintenanceHistory(@Param('vin') vin: string, @Param('mechanic') mechanic: string) {
    return this.registry.getMaintenanceHistory(vin, mechanic);
  }

  @Post('vehicles/:vin/policies')
  createInsurancePolicy(
    @CallerAddress() caller: string | undefined,
    @Param('vin') vin: string,
    @Body() dto: CreateInsurancePolicyDto,
  ) {
    return this.registry.createInsurancePolicy(this.keyring.resolveCaller(caller), vin, dto.startDate, dto.endDate);
  }

  @Get('vehicles/:vin/policy')
  getInsurancePolicy(@Param('vin') vin: string) {
    return this.registry.getInsurancePolicy(vin);
  }

  // --- credentials ---

  @Post('credentials')
  storeCredential(@CallerAddress() caller: string | undefined, @Body() dto: StoreCredentialDto) {
    return this.registry.storeCredential(this.keyring.resolveCaller(caller), dto);
  }

  @Get('credentials/:id')
  getCredential(@Param('id') credentialId: string) {
    return this.registry.getCredential(credentialId);
  }

  // --- interactions ---

  @Post('interactions')
  recordInteraction(@CallerAddress() caller: string | undefined, @Body() dto: RecordInteractionDto) {
    return this.registry.recordInteraction({ ...dto, source: this.keyring.resolveCaller(caller) });
  }

  @Get('interactions/:identifier')
  queryByIdentifier(@Param('identifier') identifier: string) {
    return this.registry.queryByIdentifier(identifier);
  }

  @Get('interactions/:a/:b')
  queryBetween(@Param('a') a: string, @Param('b') b: string) {
    return this.registry.queryBetween(a, b);
  }
}
