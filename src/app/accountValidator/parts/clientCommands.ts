/**
 * Команды CLI клиента: account login/get/logout
 */

import { ICommandSpec } from '../../commandExecutor/interfaces/ICommandExecutor';
import { IClientCommands } from '../interfaces/IAccountValidator';

/**
 * @param _client - исполняемый файл и его собственные аргументы (из VPN_CLIENT_COMMAND)
 */
export function buildClientCommands(_client: ICommandSpec = { executable: 'mullvad', args: [] }): IClientCommands {
    const withArgs = (..._args: string[]): ICommandSpec => ({
        executable: _client.executable,
        args: [..._client.args, ..._args]
    });

    return {
        login: (_account) => withArgs('account', 'login', _account),
        status: () => withArgs('account', 'get'),
        logout: () => withArgs('account', 'logout')
    };
}
