/** 외부 클라우드 SDK 래퍼가 구현하는 좁은 인터페이스. 이 저장소에는 구현이 없다. */

export type VmInstance = {
  id: string;
  name: string;
  state: string;
  type?: string;
  public_ip?: string;
  launched_at?: string;
};

export type AwsListFilter = {
  state?: string;
  type?: string;
};

export type AwsCreateRequest = {
  name: string;
  instance_type: string;
  key_name?: string;
  requested_by: string;
};

export type AwsModifyAction = "start" | "stop" | "terminate";

export interface AwsVmProvider {
  list_instances(region: string, filter: AwsListFilter): Promise<VmInstance[]>;
  create_instance(region: string, request: AwsCreateRequest): Promise<VmInstance>;
  modify_instance(region: string, instance_id: string, action: AwsModifyAction): Promise<VmInstance>;
}

export type OpenStackListFilter = {
  status?: string;
  flavor?: string;
};

export type OpenStackCreateRequest = {
  name: string;
  image_id: string;
  flavor: string;
  network: string;
  key_name?: string;
};

export interface OpenStackVmProvider {
  list_servers(filter: OpenStackListFilter): Promise<VmInstance[]>;
  create_server(request: OpenStackCreateRequest): Promise<VmInstance>;
}
